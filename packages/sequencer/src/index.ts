/**
 * Public surface of the sequencer package.
 */
export * from './config'
export * from './clients/L1Client'
export { EthersL1Client } from './clients/EthersL1Client'
export * from './services/ResourceAccountant'
export * from './services/SealCriteria'
export * from './services/SealedBatchStore'
export * from './services/StateKeeper'
export * from './services/GasAdjuster'
export * from './services/BundleEncoder'
export * from './services/ProofGate'
export { HttpProofStore } from './services/HttpProofStore'
export * from './services/BatchAggregator'
export * from './services/NonceManager'
export * from './services/ErrorClassifier'
export * from './services/L1Sender'
export * from './pipeline/Pipeline'
export { parseLine } from './ingest'
export type { IngestMessage } from './ingest'
export { setLogger, getLogger } from './utils/logger'
export { setRegistry, getRegistry } from './utils/metrics'
