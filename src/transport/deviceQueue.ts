import { TransportFailureError } from '../errors.js'
import { RequestQueue, RequestTasks } from './requestQueue.js'
import { IrequestStatistics, RequestWorker } from './requestWorker.js'

/**
 * Serializes every request to one device handle. After close() has run, further requests
 * are rejected with TransportFailureError.
 */
export class DeviceQueue {
  private worker: RequestWorker
  private closed = false
  constructor(readonly name: string) {
    this.worker = new RequestWorker(new RequestQueue(name))
  }

  run<T>(label: string, task: RequestTasks, fn: () => Promise<T>): Promise<T> {
    if (this.closed) return Promise.reject(new TransportFailureError(this.name + ' is closed'))
    return this.worker.submit(label, task, fn)
  }

  isClosed(): boolean {
    return this.closed
  }

  /*
   * Runs fn after all pending requests, then refuses new ones.
   */
  async close(fn: () => Promise<void>): Promise<void> {
    if (this.closed) return
    const rc = this.worker.submit('close', RequestTasks.close, fn)
    this.closed = true
    try {
      await rc
    } finally {
      this.worker.stop()
    }
  }

  getStatistics(): IrequestStatistics {
    return this.worker.getStatistics()
  }
}
