import { RequestQueue, RequestTasks } from './requestQueue.js'
import { RequestWorker } from './requestWorker.js'

// One worker per transport instance: enumerating and opening devices on one transport never interleaves
const workers = new WeakMap<object, RequestWorker>()

export function runDiscoveryExclusive<T>(transport: object, label: string, fn: () => Promise<T>): Promise<T> {
  let worker = workers.get(transport)
  if (worker == undefined) {
    worker = new RequestWorker(new RequestQueue('discovery'))
    workers.set(transport, worker)
  }
  return worker.submit(label, RequestTasks.discovery, fn)
}
