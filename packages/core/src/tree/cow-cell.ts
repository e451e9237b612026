export interface Cloneable<T> {
  clone(): T;
}

/**
 * Copy-on-write reference.
 *
 * An owned cell is the only holder of its value and may mutate it in place.
 * A shared cell must not: `makeMutable()` hands back an owned cell around a
 * clone instead, and the caller stores that cell in place of the old one.
 */
export class CowCell<T extends Cloneable<T>> {
  constructor(
    private readonly value: T,
    public readonly owned: boolean
  ) {}

  static owned<T extends Cloneable<T>>(value: T): CowCell<T> {
    return new CowCell(value, true);
  }

  static shared<T extends Cloneable<T>>(value: T): CowCell<T> {
    return new CowCell(value, false);
  }

  view(): T {
    return this.value;
  }

  makeMutable(): CowCell<T> {
    if (this.owned) {
      return this;
    }
    return new CowCell(this.value.clone(), true);
  }

  shareView(): CowCell<T> {
    return new CowCell(this.value, false);
  }
}
