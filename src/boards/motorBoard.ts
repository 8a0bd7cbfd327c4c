import type { Backend } from '../backends/backend.js'
import { ComponentClass } from '../components/component.js'
import { Motor, MotorInterface, MotorSpecialState, MotorState } from '../components/motor.js'
import { Board, SafeStep } from './board.js'

export type MotorBoardBackend = Backend & MotorInterface

export class MotorBoard extends Board<MotorBoardBackend> {
  readonly name = 'Student Robotics v4 Motor Board'
  readonly motors: readonly Motor[]
  /** State every motor is set to by makeSafe(). */
  safeState: MotorState = MotorSpecialState.BRAKE

  constructor(serialNumber: string, backend: MotorBoardBackend) {
    super(serialNumber, backend)
    this.motors = [0, 1].map((i) => new Motor(i, backend))
  }

  protected override safeSteps(): SafeStep[] {
    return this.motors.map((motor) => ({ component: motor, run: () => motor.setPower(this.safeState) }))
  }

  static supportedComponents(): readonly ComponentClass[] {
    return [Motor]
  }
}
