export interface IdGenerator<T> {
  generate(): T
}

/**
 * Derives an id from a seed. Equal seeds always yield equal ids.
 */
export interface IdDeriver<T> {
  derive(seed: string): T
}
