import { ID_OPTION_NAME, OptionSource, RawOption } from './RawOption';
import { VisitorProtocolError } from './errors';

/**
 * FIFO queue of the not-yet-consumed occurrences sharing one name.
 * A queue held by the index is never empty.
 */
export class OptionQueue {
  private readonly _items: RawOption[] = [];

  constructor(readonly name: string) {}

  get length(): number {
    return this._items.length;
  }

  get isEmpty(): boolean {
    return this._items.length === 0;
  }

  push(option: RawOption): void {
    this._items.push(option);
  }

  /** Oldest occurrence, or undefined when empty. */
  peekHead(): RawOption | undefined {
    return this._items[0];
  }

  /** Most recent occurrence, or undefined when empty. */
  peekTail(): RawOption | undefined {
    return this._items[this._items.length - 1];
  }

  popHead(): RawOption | undefined {
    return this._items.shift();
  }
}

/**
 * Occurrences not yet consumed by a decode pass, grouped by name.
 * Iteration follows the order in which names first appeared in the source.
 */
export class UnprocessedIndex {
  private readonly _queues = new Map<string, OptionQueue>();

  private constructor() {}

  /**
   * Group every occurrence by name in source order. The identifier, when
   * present, becomes a synthetic occurrence named `id`.
   */
  static build(source: OptionSource): UnprocessedIndex {
    const index = new UnprocessedIndex();
    for (const option of source.options) {
      if (source.id !== undefined && option.name === ID_OPTION_NAME) {
        throw new VisitorProtocolError(
          `Option source carries both an identifier and an option named '${ID_OPTION_NAME}'`,
        );
      }
      index.insert(option);
    }
    if (source.id !== undefined) {
      index.insert({ name: ID_OPTION_NAME, value: source.id });
    }
    return index;
  }

  /** Number of distinct names with at least one unconsumed occurrence. */
  get size(): number {
    return this._queues.size;
  }

  has(name: string): boolean {
    return this._queues.has(name);
  }

  lookup(name: string): OptionQueue | undefined {
    return this._queues.get(name);
  }

  /** Mark every occurrence of `name` consumed. */
  remove(name: string): void {
    this._queues.delete(name);
  }

  /** Head occurrence of the first name (in source order) still unconsumed. */
  firstRemaining(): RawOption | undefined {
    for (const queue of this._queues.values()) {
      return queue.peekHead();
    }
    return undefined;
  }

  /** Remaining names, in source order. */
  names(): string[] {
    return [...this._queues.keys()];
  }

  private insert(option: RawOption): void {
    let queue = this._queues.get(option.name);
    if (!queue) {
      queue = new OptionQueue(option.name);
      this._queues.set(option.name, queue);
    }
    queue.push(option);
  }
}
