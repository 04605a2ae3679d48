import { tablesInDependencyOrder } from '../src/ddl'
import { findSchemaFindings } from '../src/schema-guard'

/**
 * Schema guard.
 *
 * Fails (exit 1) when the declared tables break the store's integrity
 * conventions: uncovered foreign keys, non-cascading owned children,
 * unguarded sibling orders or state enums out of step with their machines.
 */
function main() {
  const findings = findSchemaFindings()
  const errors = findings.filter((f) => f.level === 'error')
  const warns = findings.filter((f) => f.level === 'warn')

  for (const finding of findings) {
    const prefix = finding.level === 'error' ? 'ERROR' : 'WARN '
    console.log(`${prefix} [${finding.rule}] ${finding.table} -> ${finding.detail}`)
  }

  console.log(
    `schema-guard: ${errors.length} error(s), ${warns.length} warning(s) across ${tablesInDependencyOrder.length} table(s).`,
  )

  if (errors.length > 0) process.exit(1)
}

main()
