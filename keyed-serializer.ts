/**
 * Per-key task serialization with supersession.
 *
 * Tasks for one key run strictly in submission order, one at a time; keys
 * are independent. A task that is queued but not yet started absorbs later
 * submissions with the same label: the queued task reads fresh state when
 * it starts, so running it once covers every request it absorbed. Once a
 * task has started it runs to completion and new submissions queue behind it.
 */

type Lane<T> = {
  tail: Promise<void>;
  queued: Map<string, Promise<T>>;
  outstanding: number;
};

export class KeyedSerializer<T> {
  private readonly lanes = new Map<string, Lane<T>>();

  run(key: string, label: string, task: () => Promise<T>): Promise<T> {
    let lane = this.lanes.get(key);
    if (!lane) {
      lane = { tail: Promise.resolve(), queued: new Map(), outstanding: 0 };
      this.lanes.set(key, lane);
    }

    const existing = lane.queued.get(label);
    if (existing) return existing;

    const current = lane;
    const result = current.tail.then(() => {
      current.queued.delete(label);
      return task();
    });
    current.queued.set(label, result);
    current.outstanding++;

    // Sequencing only: the outcome reaches the caller through `result`.
    const done = () => {
      current.outstanding--;
      if (current.outstanding === 0 && this.lanes.get(key) === current) {
        this.lanes.delete(key);
      }
    };
    current.tail = result.then(done, done);
    return result;
  }

  /** Keys with queued or running tasks. */
  activeKeys(): string[] {
    return [...this.lanes.keys()];
  }

  /** Resolves once every task submitted so far has settled. */
  async idle(): Promise<void> {
    await Promise.all([...this.lanes.values()].map((lane) => lane.tail));
  }
}
