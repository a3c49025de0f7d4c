export * from './acceptor'
export * from './application'
export * from './config'
export * from './transport/framing'
export * from './transport/reader'
export * from './transport/writer'
export * from './worker'
