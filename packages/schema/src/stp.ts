import { VlanRanges } from './vlan'

/** Prefix of every NSI network identifier. */
export const URN_PREFIX = 'urn:ogf:network'

/**
 * Service Termination Point.
 *
 * Text form: `urn:ogf:network:<domain>:<network_type>:<port>?<labels>`, where
 * `labels` is optional and usually `vlan=<range>`.
 */
export class Stp {
  constructor(
    readonly domain: string,
    readonly networkType: string,
    readonly port: string,
    readonly labels: string | null = null,
  ) {}

  static parse(text: string): Stp {
    if (!text.startsWith(`${URN_PREFIX}:`)) {
      throw new Error(`STP "${text}" does not start with "${URN_PREFIX}:"`)
    }
    const [identifier = '', labels] = text.slice(URN_PREFIX.length + 1).split('?', 2)
    // domain is `<fqdn>:<year>` in NSI, so it takes two segments
    const parts = identifier.split(':')
    if (parts.length < 4) {
      throw new Error(`STP "${text}" needs domain, network type and port`)
    }
    const port = parts.pop() ?? ''
    const networkType = parts.pop() ?? ''
    return new Stp(parts.join(':'), networkType, port, labels ?? null)
  }

  /** VLANs from a `vlan=` label, or null when the STP carries none. */
  get vlanRanges(): VlanRanges | null {
    if (!this.labels) return null
    const match = /(?:^|&)vlan=([^&]+)/.exec(this.labels)
    return match?.[1] ? VlanRanges.parse(match[1]) : null
  }

  toString(): string {
    const base = `${URN_PREFIX}:${this.domain}:${this.networkType}:${this.port}`
    return this.labels ? `${base}?${this.labels}` : base
  }
}
