export { resolvePorts } from './scanner/ports.js'
export { lookupService, DEFAULT_PORTS, PORT_SERVICES } from './scanner/services.js'
export { probePort, type ProbeOutcome, type PortProber, type PortStatus } from './scanner/tcp.js'
export { scanHost, DEFAULT_CONCURRENCY, type ScanOptions } from './scanner/port-scan.js'
export * from './report/index.js'
export * from './errors.js'
export { loadConfig, type Config } from './config.js'
export { createLogger, type Logger } from './utils/logger.js'
export { runCli } from './cli/run.js'
