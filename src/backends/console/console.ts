import { createInterface } from 'readline/promises'
import { Observable, Subject } from 'rxjs'

export type PrintFunction = (line: string) => void
export type InputFunction = (prompt: string) => Promise<string>

export interface ValueParser<T> {
  readonly typeName: string
  parse(text: string): T | undefined
}

const boolWords = new Map<string, boolean>([
  ['true', true],
  ['yes', true],
  ['false', false],
  ['no', false],
])

export const boolParser: ValueParser<boolean> = {
  typeName: 'bool',
  parse: (text) => boolWords.get(text.trim().toLowerCase()),
}

export const floatParser: ValueParser<number> = {
  typeName: 'float',
  parse: (text) => {
    const t = text.trim()
    if (t.length == 0) return undefined
    const n = Number(t)
    return Number.isFinite(n) ? n : undefined
  },
}

export const stringParser: ValueParser<string> = {
  typeName: 'str',
  parse: (text) => text,
}

function printToStdout(line: string): void {
  process.stdout.write(line + '\n')
}

async function questionOnStdin(prompt: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout })
  try {
    return await rl.question(prompt)
  } finally {
    rl.close()
  }
}

/**
 * Line based stand-in for hardware: prints every state change and asks the user for every
 * sensed value. Every printed line is also emitted on `output`.
 */
export class Console {
  private lines = new Subject<string>()
  constructor(
    readonly descriptor: string,
    private print: PrintFunction = printToStdout,
    private input: InputFunction = questionOnStdin
  ) {}

  get output(): Observable<string> {
    return this.lines.asObservable()
  }

  info(message: string): void {
    const line = this.descriptor + ': ' + message
    this.print(line)
    this.lines.next(line)
  }

  /**
   * Asks until the answer parses.
   */
  async read<T>(prompt: string, parser: ValueParser<T>): Promise<T> {
    for (;;) {
      const response = await this.input(this.descriptor + ': ' + prompt + ': ')
      const value = parser.parse(response)
      if (value !== undefined) return value
      this.info(`Unable to construct a ${parser.typeName} from '${response}'`)
    }
  }

  async waitForReturn(prompt: string): Promise<void> {
    await this.input(this.descriptor + ': ' + prompt + ': ')
  }

  complete(): void {
    this.lines.complete()
  }
}

export type ConsoleFactory = (descriptor: string) => Console

export const defaultConsoleFactory: ConsoleFactory = (descriptor) => new Console(descriptor)
