import { Component, defineInterface, requireBoolean } from './component.js'

export interface PowerOutputInterface {
  getPowerOutputEnabled(identifier: number): Promise<boolean>
  setPowerOutputEnabled(identifier: number, enabled: boolean): Promise<void>
  /** Amps. */
  getPowerOutputCurrent(identifier: number): Promise<number>
}
export const PowerOutputInterface = defineInterface<PowerOutputInterface>('PowerOutputInterface', [
  'getPowerOutputEnabled',
  'setPowerOutputEnabled',
  'getPowerOutputCurrent',
])

export class PowerOutput extends Component<PowerOutputInterface> {
  static readonly requiredInterface = PowerOutputInterface

  isEnabled(): Promise<boolean> {
    return this.backend.getPowerOutputEnabled(this.identifier)
  }

  async setEnabled(enabled: boolean): Promise<void> {
    requireBoolean(enabled, 'Power output state')
    await this.backend.setPowerOutputEnabled(this.identifier, enabled)
  }

  getCurrent(): Promise<number> {
    return this.backend.getPowerOutputCurrent(this.identifier)
  }
}

/**
 * The power outputs of one board, addressed by their position names.
 */
export class PowerOutputGroup<K extends string | number> implements Iterable<PowerOutput> {
  constructor(private readonly outputs: ReadonlyMap<K, PowerOutput>) {}

  get(key: K): PowerOutput {
    const output = this.outputs.get(key)
    if (output == undefined) throw new RangeError('No power output ' + String(key))
    return output
  }

  get size(): number {
    return this.outputs.size
  }

  async powerOn(): Promise<void> {
    for (const output of this.outputs.values()) await output.setEnabled(true)
  }

  async powerOff(): Promise<void> {
    for (const output of this.outputs.values()) await output.setEnabled(false)
  }

  [Symbol.iterator](): Iterator<PowerOutput> {
    return this.outputs.values()
  }
}
