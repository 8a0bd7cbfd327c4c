import { InvalidArgumentError } from '../errors.js'
import { Component, defineInterface } from './component.js'

/** Frequencies in Hz. */
export enum Note {
  C6 = 1046.5,
  D6 = 1174.66,
  E6 = 1318.51,
  F6 = 1396.91,
  G6 = 1567.98,
  A6 = 1760.0,
  B6 = 1975.53,
  C7 = 2093.0,
  D7 = 2349.32,
  E7 = 2637.02,
  F7 = 2793.83,
  G7 = 3135.96,
  A7 = 3520.0,
  B7 = 3951.07,
}

export interface PiezoInterface {
  buzz(identifier: number, durationMs: number, frequencyHz: number, blocking: boolean): Promise<void>
}
export const PiezoInterface = defineInterface<PiezoInterface>('PiezoInterface', ['buzz'])

export class Piezo extends Component<PiezoInterface> {
  static readonly requiredInterface = PiezoInterface

  /**
   * Plays a tone. With blocking set, resolves once the tone has finished.
   */
  async buzz(durationMs: number, pitch: number | Note, blocking = false): Promise<void> {
    if (typeof durationMs !== 'number' || !Number.isFinite(durationMs) || durationMs < 0)
      throw new InvalidArgumentError('Duration must be a non-negative number of milliseconds, got ' + String(durationMs))
    if (typeof pitch !== 'number' || !Number.isFinite(pitch) || pitch <= 0)
      throw new InvalidArgumentError('Frequency must be a positive number of Hz, got ' + String(pitch))
    await this.backend.buzz(this.identifier, durationMs, pitch, blocking)
  }
}
