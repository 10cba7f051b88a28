export { IdAllocator } from './id-allocator'
export { EntityStore } from './entity-store'
export { AdjacencyIndex } from './adjacency-index'
