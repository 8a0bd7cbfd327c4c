import Debug from 'debug'
import { RequestQueue, RequestTasks } from './requestQueue.js'

const debug = Debug('requestworker')

export interface IrequestStatistics {
  requestCount: number[]
  errorCount: number
  queueLength: number
}

/*
 * Drains a RequestQueue strictly sequentially: the next entry starts only after the
 * previous one has resolved or rejected. This is the mutual exclusion for one device handle.
 */
export class RequestWorker {
  private isRunning = false
  private requestCount: number[] = new Array<number>(Object.keys(RequestTasks).length / 2).fill(0)
  private errorCount = 0
  private listener = () => {
    this.run()
  }
  constructor(protected queue: RequestQueue) {
    this.queue.addNewEntryListener(this.listener)
  }

  /*
   * Queues fn and resolves with its result once every earlier request has finished.
   */
  submit<T>(label: string, task: RequestTasks, fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.enqueue(
        label,
        task,
        () => fn().then(resolve),
        (_qe, e) => {
          reject(e)
        }
      )
    })
  }

  private processOneEntry(): Promise<void> | undefined {
    const current = this.queue.dequeue()
    if (current) {
      debug(this.queue.name + ' processOneEntry: ql:' + this.queue.getLength() + ' ' + current.label)
      this.requestCount[current.task]++
      return Promise.resolve()
        .then(() => current.execute())
        .catch((e: unknown) => {
          this.errorCount++
          debug(this.queue.name + ' ' + current.label + ' failed')
          current.onError(current, e)
        })
        .then(() => this.processOneEntry())
    } else {
      this.isRunning = false
      return undefined
    }
  }

  run() {
    if (this.queue.getLength() == 0) return // nothing to do
    if (this.isRunning) return
    this.isRunning = true
    void this.processOneEntry()
  }

  getStatistics(): IrequestStatistics {
    return {
      requestCount: [...this.requestCount],
      errorCount: this.errorCount,
      queueLength: this.queue.getLength(),
    }
  }

  stop() {
    this.queue.removeNewEntryListener(this.listener)
  }
}
