export * from './BaseNode'
export * from './guards'
export * from './MultiNode'
export * from './Node'
export * from './node-patterns'
export * from './policies'
export * from './TransitionNode'
