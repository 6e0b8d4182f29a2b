export * from './batch'
export * from './mermaid'
export * from './sleep'
