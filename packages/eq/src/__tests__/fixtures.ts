import type { DynEq } from "../index.js";

export interface Shape extends DynEq {
  area(): number;
}

export class Circle implements Shape {
  constructor(readonly radius: number) {}
  area(): number {
    return Math.PI * this.radius ** 2;
  }
  equals(other: Circle): boolean {
    return this.radius === other.radius;
  }
}

export class Square implements Shape {
  constructor(readonly side: number) {}
  area(): number {
    return this.side ** 2;
  }
  equals(other: Square): boolean {
    return this.side === other.side;
  }
}

/** Same native equality as its parent, distinct runtime type. */
export class TaggedCircle extends Circle {}

export interface Labelled extends DynEq {
  label(): string;
}

export class A implements Labelled {
  constructor(readonly value: number) {}
  label(): string {
    return `A${this.value}`;
  }
  equals(other: A): boolean {
    return this.value === other.value;
  }
}

export class B implements Labelled {
  constructor(readonly value: number) {}
  label(): string {
    return `B${this.value}`;
  }
  equals(other: B): boolean {
    return this.value === other.value;
  }
}

/** Native equality that counts how often it runs. */
export class Counted implements Labelled {
  static calls = 0;
  constructor(readonly value: string) {}
  label(): string {
    return this.value;
  }
  equals(other: Counted): boolean {
    Counted.calls++;
    return this.value === other.value;
  }
}
