import { Component, defineInterface } from './component.js'

export interface ButtonInterface {
  getButtonState(identifier: number): Promise<boolean>
  waitUntilButtonPressed(identifier: number): Promise<void>
}
export const ButtonInterface = defineInterface<ButtonInterface>('ButtonInterface', ['getButtonState', 'waitUntilButtonPressed'])

export class Button extends Component<ButtonInterface> {
  static readonly requiredInterface = ButtonInterface

  isPressed(): Promise<boolean> {
    return this.backend.getButtonState(this.identifier)
  }

  waitUntilPressed(): Promise<void> {
    return this.backend.waitUntilButtonPressed(this.identifier)
  }
}
