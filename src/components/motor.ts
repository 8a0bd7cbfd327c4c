import { Component, defineInterface, requireInRange } from './component.js'

export enum MotorSpecialState {
  COAST = 'COAST',
  BRAKE = 'BRAKE',
}

/** A power between -1 (full reverse) and 1 (full forward), or a special state. */
export type MotorState = number | MotorSpecialState

export function isMotorSpecialState(state: unknown): state is MotorSpecialState {
  return state === MotorSpecialState.COAST || state === MotorSpecialState.BRAKE
}

export function formatMotorState(state: MotorState): string {
  return isMotorSpecialState(state) ? state : String(state)
}

export interface MotorInterface {
  getMotorState(identifier: number): Promise<MotorState>
  setMotorState(identifier: number, state: MotorState): Promise<void>
}
export const MotorInterface = defineInterface<MotorInterface>('MotorInterface', ['getMotorState', 'setMotorState'])

export class Motor extends Component<MotorInterface> {
  static readonly requiredInterface = MotorInterface

  getPower(): Promise<MotorState> {
    return this.backend.getMotorState(this.identifier)
  }

  async setPower(state: MotorState): Promise<void> {
    if (!isMotorSpecialState(state)) requireInRange(state, -1, 1, 'Motor power')
    await this.backend.setMotorState(this.identifier, state)
  }
}
