export { searchRecords, matchesAny, recordsEqual } from './query-engine'
export { traverse, Frontier, depthFirst, breadthFirst } from './traversal'
export type { Selector, Neighbors } from './traversal'
