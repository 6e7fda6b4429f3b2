export type { ScanReport, StructuredReport } from './types.js'
export {
  toStructured,
  toStructuredForm,
  parseStructuredForm,
  saveReport,
  loadReport,
} from './serializer.js'
