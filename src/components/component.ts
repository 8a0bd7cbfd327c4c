import { InvalidArgumentError } from '../errors.js'

/**
 * Run-time half of an interface: its name and the operations a backend has to provide.
 * The compile-time half is the TypeScript interface of the same name.
 */
export interface InterfaceDescriptor {
  readonly name: string
  readonly operations: readonly string[]
}

export function defineInterface<I>(name: string, operations: readonly (keyof I & string)[]): InterfaceDescriptor {
  return { name: name, operations: operations }
}

export interface ComponentClass {
  readonly name: string
  readonly requiredInterface: InterfaceDescriptor
}

/*
 * A component keeps nothing but its identifier and the backend. Every read goes to the backend.
 */
export abstract class Component<I> {
  constructor(
    readonly identifier: number,
    protected readonly backend: I
  ) {}

  toString(): string {
    return this.constructor.name + '(' + this.identifier + ')'
  }
}

export function requireBoolean(value: unknown, what: string): asserts value is boolean {
  if (typeof value !== 'boolean') throw new InvalidArgumentError(what + ' must be a boolean, got ' + String(value))
}

export function requireInRange(value: unknown, min: number, max: number, what: string): asserts value is number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < min || value > max)
    throw new InvalidArgumentError(what + ' must be between ' + min + ' and ' + max + ', got ' + String(value))
}
