import { renderSchemaDdl } from '../src/ddl'

// Prints the DDL so it can be reviewed or piped into psql.
console.log(renderSchemaDdl())
