import { Component, defineInterface } from './component.js'

export interface BatterySensorInterface {
  getBatterySensorVoltage(identifier: number): Promise<number>
  getBatterySensorCurrent(identifier: number): Promise<number>
}
export const BatterySensorInterface = defineInterface<BatterySensorInterface>('BatterySensorInterface', [
  'getBatterySensorVoltage',
  'getBatterySensorCurrent',
])

export class BatterySensor extends Component<BatterySensorInterface> {
  static readonly requiredInterface = BatterySensorInterface

  /** Volts. */
  getVoltage(): Promise<number> {
    return this.backend.getBatterySensorVoltage(this.identifier)
  }

  /** Amps. */
  getCurrent(): Promise<number> {
    return this.backend.getBatterySensorCurrent(this.identifier)
  }
}
