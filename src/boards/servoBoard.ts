import type { Backend } from '../backends/backend.js'
import { ComponentClass } from '../components/component.js'
import { Servo, ServoInterface } from '../components/servo.js'
import { Board } from './board.js'

export type ServoBoardBackend = Backend & ServoInterface

export const SERVO_COUNT = 12

// Leaving the servos where they are is the safe state, so there are no safe steps.
export class ServoBoard extends Board<ServoBoardBackend> {
  readonly name = 'Student Robotics v4 Servo Board'
  readonly servos: readonly Servo[]

  constructor(serialNumber: string, backend: ServoBoardBackend) {
    super(serialNumber, backend)
    this.servos = Array.from({ length: SERVO_COUNT }, (_v, i) => new Servo(i, backend))
  }

  static supportedComponents(): readonly ComponentClass[] {
    return [Servo]
  }
}
