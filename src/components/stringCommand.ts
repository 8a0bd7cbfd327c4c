import { InvalidArgumentError } from '../errors.js'
import { Component, defineInterface } from './component.js'

export interface StringCommandInterface {
  executeStringCommand(identifier: number, command: string): Promise<string>
}
export const StringCommandInterface = defineInterface<StringCommandInterface>('StringCommandInterface', ['executeStringCommand'])

/** Passes free text to firmware that understands it and returns the reply. */
export class StringCommand extends Component<StringCommandInterface> {
  static readonly requiredInterface = StringCommandInterface

  async execute(command: string): Promise<string> {
    if (typeof command !== 'string') throw new InvalidArgumentError('A command must be a string.')
    if (command.length == 0) throw new InvalidArgumentError('A command must not be an empty string.')
    return this.backend.executeStringCommand(this.identifier, command)
  }
}
