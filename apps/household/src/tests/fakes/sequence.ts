/** Auto-increment ids, starting at 1 unless told otherwise. */
export class Sequence {
  constructor(private last = 0) {}

  next(): number {
    this.last += 1
    return this.last
  }
}

/** Rows handed out are copies, the way a database driver returns fresh objects. */
export function copy<T>(value: T): T {
  return structuredClone(value)
}
