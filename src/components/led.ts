import { Component, defineInterface, requireBoolean } from './component.js'

export interface LEDInterface {
  getLedState(identifier: number): Promise<boolean>
  setLedState(identifier: number, state: boolean): Promise<void>
}
export const LEDInterface = defineInterface<LEDInterface>('LEDInterface', ['getLedState', 'setLedState'])

export class LED extends Component<LEDInterface> {
  static readonly requiredInterface = LEDInterface

  getState(): Promise<boolean> {
    return this.backend.getLedState(this.identifier)
  }

  async setState(state: boolean): Promise<void> {
    requireBoolean(state, 'LED state')
    await this.backend.setLedState(this.identifier, state)
  }
}
