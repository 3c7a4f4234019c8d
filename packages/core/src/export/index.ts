export { ExportTokenIssuer } from './token.js'
export type { ExportTokenIssuerOptions, ExportTokenPayload } from './token.js'
export { toExportRows, toCsv, toJsonExport, isExportFormat } from './serialize.js'
export type { ExportFormat, ExportRow } from './serialize.js'
