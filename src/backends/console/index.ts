import { Environment } from '../environment.js'
import { ConsoleDiscoveryOptions } from './consoleBackend.js'
import { ConsoleMotorBoardBackend } from './motorBoard.js'
import { ConsolePowerBoardBackend } from './powerBoard.js'
import { ConsoleRuggeduinoBackend } from './ruggeduino.js'
import { ConsoleServoBoardBackend } from './servoBoard.js'

export * from './console.js'
export * from './consoleBackend.js'
export { ConsoleMotorBoardBackend, ConsolePowerBoardBackend, ConsoleRuggeduinoBackend, ConsoleServoBoardBackend }

/**
 * Every board, simulated on a console. All boards share the options.
 */
export function createConsoleEnvironment(options: ConsoleDiscoveryOptions = {}): Environment {
  return new Environment('ConsoleEnvironment')
    .registerBackend(ConsoleMotorBoardBackend, options)
    .registerBackend(ConsoleServoBoardBackend, options)
    .registerBackend(ConsolePowerBoardBackend, options)
    .registerBackend(ConsoleRuggeduinoBackend, options)
}
