export * from './util'
export * from './ir'
export * from './library'
export * from './encoder'
export * from './fold'
export * from './loops'
export * from './peephole'
export * from './emit'
export * from './runtime'
export * from './interpreter'
export * from './compiler'
export * from './driver'
export * from './testing'
