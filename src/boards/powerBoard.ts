import { setTimeout as sleep } from 'timers/promises'
import type { Backend } from '../backends/backend.js'
import { BatterySensor, BatterySensorInterface } from '../components/batterySensor.js'
import { Button, ButtonInterface } from '../components/button.js'
import { ComponentClass } from '../components/component.js'
import { LED, LEDInterface } from '../components/led.js'
import { Piezo, PiezoInterface } from '../components/piezo.js'
import { PowerOutput, PowerOutputGroup, PowerOutputInterface } from '../components/powerOutput.js'
import { Board, SafeStep } from './board.js'

export type PowerBoardBackend = Backend & PowerOutputInterface & PiezoInterface & ButtonInterface & BatterySensorInterface & LEDInterface

/** Output names; the values are the identifiers used on the wire. */
export enum PowerOutputPosition {
  H0 = 0,
  H1 = 1,
  L0 = 2,
  L1 = 3,
  L2 = 4,
  L3 = 5,
}

export const powerOutputPositions: readonly PowerOutputPosition[] = [
  PowerOutputPosition.H0,
  PowerOutputPosition.H1,
  PowerOutputPosition.L0,
  PowerOutputPosition.L1,
  PowerOutputPosition.L2,
  PowerOutputPosition.L3,
]

export const RUN_LED = 0
export const ERROR_LED = 1

export class PowerBoard extends Board<PowerBoardBackend> {
  readonly name = 'Student Robotics v4 Power Board'
  readonly outputs: PowerOutputGroup<PowerOutputPosition>
  readonly piezo: Piezo
  readonly startButton: Button
  readonly batterySensor: BatterySensor
  readonly runLed: LED
  readonly errorLed: LED

  constructor(serialNumber: string, backend: PowerBoardBackend) {
    super(serialNumber, backend)
    const outputs = new Map<PowerOutputPosition, PowerOutput>()
    powerOutputPositions.forEach((p) => outputs.set(p, new PowerOutput(p, backend)))
    this.outputs = new PowerOutputGroup(outputs)
    this.piezo = new Piezo(0, backend)
    this.startButton = new Button(0, backend)
    this.batterySensor = new BatterySensor(0, backend)
    this.runLed = new LED(RUN_LED, backend)
    this.errorLed = new LED(ERROR_LED, backend)
  }

  protected override safeSteps(): SafeStep[] {
    return [...this.outputs].map((output) => ({ component: output, run: () => output.setEnabled(false) }))
  }

  /**
   * Flashes the run LED until the start button is pressed, then leaves it on.
   */
  async waitForStartFlash(pollIntervalMs = 50): Promise<void> {
    let counter = 0
    let ledState = false
    while (!(await this.startButton.isPressed())) {
      if (counter % 6 == 0) {
        ledState = !ledState
        await this.runLed.setState(ledState)
      }
      await sleep(pollIntervalMs)
      counter++
    }
    await this.runLed.setState(true)
  }

  static supportedComponents(): readonly ComponentClass[] {
    return [PowerOutput, Piezo, Button, BatterySensor, LED]
  }
}
