import EventEmitter from 'events'
const EventNewEntry = 'newEntry'

export enum RequestTasks {
  discovery,
  validation,
  read,
  write,
  close,
}

export interface IQueueEntry {
  label: string
  task: RequestTasks
  execute: () => Promise<unknown>
  onError: (queueEntry: IQueueEntry, e: unknown) => void
}

/*
 * Pending requests for one device handle (or one transport, for discovery).
 * Entries are taken out in arrival order; the RequestWorker runs them one at a time.
 */
export class RequestQueue {
  private eventEmitter = new EventEmitter()
  private list: IQueueEntry[] = []
  constructor(readonly name: string) {}
  enqueueEntry(entry: IQueueEntry) {
    this.list.push(entry)
    this.eventEmitter.emit(EventNewEntry)
  }
  enqueue(
    label: string,
    task: RequestTasks,
    execute: () => Promise<unknown>,
    onError: (queueEntry: IQueueEntry, e: unknown) => void
  ) {
    const entry: IQueueEntry = {
      label: label,
      task: task,
      execute: execute,
      onError: onError,
    }
    this.enqueueEntry(entry)
  }
  dequeue(): IQueueEntry | undefined {
    return this.list.shift()
  }
  addNewEntryListener(listener: () => void) {
    this.eventEmitter.addListener(EventNewEntry, listener)
  }
  removeNewEntryListener(listener: () => void) {
    this.eventEmitter.removeListener(EventNewEntry, listener)
  }
  getLength(): number {
    return this.list.length
  }
}
