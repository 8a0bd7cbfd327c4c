import { Component, defineInterface, requireInRange } from './component.js'

/** -1 to 1, or null for an unpowered servo. */
export type ServoPosition = number | null

export interface ServoInterface {
  getServoPosition(identifier: number): Promise<ServoPosition>
  setServoPosition(identifier: number, position: ServoPosition): Promise<void>
}
export const ServoInterface = defineInterface<ServoInterface>('ServoInterface', ['getServoPosition', 'setServoPosition'])

export class Servo extends Component<ServoInterface> {
  static readonly requiredInterface = ServoInterface

  getPosition(): Promise<ServoPosition> {
    return this.backend.getServoPosition(this.identifier)
  }

  async setPosition(position: ServoPosition): Promise<void> {
    if (position !== null) requireInRange(position, -1, 1, 'Servo position')
    await this.backend.setServoPosition(this.identifier, position)
  }
}
