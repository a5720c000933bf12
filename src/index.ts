// Types
export * from './types/project'
export * from './types/proof'
export * from './types/access'
export * from './types/events'

// Shared libraries
export * from './lib/commitment'
export * from './lib/proof-schema'
export * from './lib/attestation'
export * from './lib/config'
export * from './lib/proof-validators'

// Contract
export { LedgerHost, type Transaction, type EventListener, type LedgerHostOptions } from './contract/host'
export { ContractStorage, Table, type InstanceState } from './contract/storage'
export { AssetLedger } from './contract/asset-ledger'
export { ProtocolError, isProtocolError, type ProtocolErrorCode } from './contract/errors'
export { MAX_FEE_BPS } from './contract/access-control'
export { computeFee, type ReleaseResult } from './contract/settlement'
export type { VerificationOutcome } from './contract/oracle-guard'
export { ImpactEscrowProtocol, type ProtocolOptions } from './contract/protocol'

// Off-chain oracle
export * from './workflows/intake-queue'
export * from './workflows/proof-oracle'
export * from './workflows/intake-http'
export * from './workflows/ledger-http'
