/**
 * Holds the current version of a read-mostly artifact (pattern catalog, trained model).
 *
 * Readers take one `current()` snapshot per call and use it throughout; writers build
 * a complete replacement and `publish()` it as a single reference swap, so a reader
 * sees either the old artifact or the new one, never a mix.
 */
export class ArtifactSlot<T> {
  private value: T;
  private generation = 0;

  constructor(initial: T) {
    this.value = initial;
  }

  current(): T {
    return this.value;
  }

  get version(): number {
    return this.generation;
  }

  publish(next: T): number {
    this.value = next;
    this.generation += 1;
    return this.generation;
  }
}
