export * from './state'
export * from './ledger'
