import { EventEmitter } from "events";

type QueueItem = {
  id: number;
  label: string;
  run: () => Promise<void>;
  cancel: (reason: Error) => void;
};

/**
 * The engine's mailbox. Tasks run one at a time in arrival order; a task
 * that fails rejects its own promise and the queue moves on.
 *
 * Emits "drained" whenever the last queued task has finished.
 */
class FrameProcessorQueue extends EventEmitter {
  private queue: QueueItem[] = [];
  private processing = false;
  private nextId = 1;

  enqueue<T>(label: string, task: () => Promise<T> | T): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const item: QueueItem = {
        id: this.nextId++,
        label,
        run: async () => {
          try {
            resolve(await task());
          } catch (error) {
            reject(error);
          }
        },
        cancel: reject,
      };

      this.queue.push(item);

      if (!this.processing) {
        void this.startProcessing();
      }
    });
  }

  private async startProcessing() {
    this.processing = true;

    while (this.queue.length > 0) {
      const item = this.queue.shift();
      if (!item) break;

      await item.run();
    }

    this.processing = false;
    this.emit("drained");
  }

  // Resolves once nothing is queued or running
  idle(): Promise<void> {
    if (!this.processing && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.once("drained", resolve));
  }

  isProcessing(): boolean {
    return this.processing;
  }

  getQueueSize(): number {
    return this.queue.length;
  }

  // Drops tasks that have not started; their promises reject
  clear(reason: Error = new Error("Frame processor queue cleared")) {
    const dropped = this.queue;
    this.queue = [];
    for (const item of dropped) {
      item.cancel(reason);
    }
  }
}

export default FrameProcessorQueue;
