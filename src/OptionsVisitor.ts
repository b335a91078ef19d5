import type { OptionSource, RawOption } from './RawOption';
import { UnprocessedIndex, OptionQueue } from './UnprocessedIndex';
import { ListMode, ListState, NO_LIST } from './ListState';
import {
  InvalidParameterError,
  InvalidParameterValueError,
  MissingParameterError,
  VisitorProtocolError,
} from './errors';
import {
  isAcceptableRange,
  parseInt64Prefix,
  parseSize,
  parseUint64,
  parseUint64Prefix,
  parseInt64,
} from './helpers';

const BOOL_TRUE = new Set(['on', 'yes', 'y']);
const BOOL_FALSE = new Set(['off', 'no', 'n']);

/**
 * Decode session over one option source.
 *
 * The caller (normally a decoder tree built from a schema) opens a struct,
 * decodes each field by name, and closes the struct. The visitor keeps an
 * index of occurrences not yet consumed, so that at the outermost
 * `endStruct` any option nobody asked for is reported.
 *
 * Lists are decoded from repeated occurrences of one name. Inside a list an
 * integer occurrence may also be written `lower-upper`, which yields every
 * value of the closed interval.
 *
 * A visitor is synchronous and meant for a single decode pass.
 */
export class OptionsVisitor {
  private readonly _source: OptionSource;
  private _depth = 0;
  private _index: UnprocessedIndex | null = null;
  private _list: ListState = NO_LIST;

  constructor(source: OptionSource) {
    this._source = source;
  }

  /** Current struct nesting depth. */
  get depth(): number {
    return this._depth;
  }

  get listMode(): ListMode {
    return this._list.mode;
  }

  /** Names that still have unconsumed occurrences, in source order. */
  get unprocessedNames(): string[] {
    return this._index ? this._index.names() : [];
  }

  // --- Structs ---

  /**
   * Open a struct and return its (empty) output record. The outermost call
   * indexes the source; nested structs share that flat namespace.
   */
  beginStruct(): Record<string, unknown> {
    if (this._depth === 0) {
      this._index = UnprocessedIndex.build(this._source);
    }
    this._depth++;
    return {};
  }

  /**
   * Close a struct. Closing the outermost one tears the index down and fails
   * with {@link InvalidParameterError} if any occurrence was never consumed.
   * When several names are left over, the first one in source order is
   * reported.
   */
  endStruct(): void {
    if (this._depth === 0) {
      throw new VisitorProtocolError('endStruct() without a matching beginStruct()');
    }
    if (--this._depth > 0) return;
    if (this._list.mode !== 'none') {
      this._depth++;
      throw new VisitorProtocolError('endStruct() closed the outermost struct while a list is active');
    }

    const leftover = this.index.firstRemaining();
    this._index = null;
    if (leftover) {
      throw new InvalidParameterError(leftover.name);
    }
  }

  /**
   * Abandon the pass after a failure: drops the index, any active list and
   * the nesting depth without checking for leftovers.
   */
  discard(): void {
    this._depth = 0;
    this._index = null;
    this._list = NO_LIST;
  }

  // --- Presence ---

  /** Whether `name` has an unconsumed occurrence. Does not consume. */
  hasField(name: string): boolean {
    if (this._list.mode !== 'none') {
      throw new VisitorProtocolError(`hasField('${name}') while a list is active`);
    }
    return this.index.has(name);
  }

  // --- Lists ---

  beginList(name: string): void {
    if (this._list.mode !== 'none') {
      throw new VisitorProtocolError(`beginList('${name}'): lists cannot nest`);
    }
    const queue = this.lookupDistinct(name);
    this._list = { mode: 'started', queue };
  }

  /**
   * Advance to the next list element. Returns false once every occurrence
   * has been consumed; the name is then gone from the index.
   */
  nextListElement(): boolean {
    const list = this._list;
    switch (list.mode) {
      case 'started':
        this._list = { mode: 'in-progress', queue: list.queue };
        return true;

      case 'signed-range':
      case 'unsigned-range':
        if (list.next < list.limit) {
          list.next++;
          return true;
        }
        this._list = { mode: 'in-progress', queue: list.queue };
        return this.popListOccurrence(list.queue);

      case 'in-progress':
        return this.popListOccurrence(list.queue);

      default:
        throw new VisitorProtocolError('nextListElement() outside a list');
    }
  }

  /** Close the active list, from any list state. */
  endList(): void {
    if (this._list.mode === 'none') {
      throw new VisitorProtocolError('endList() without a matching beginList()');
    }
    this._list = NO_LIST;
  }

  // --- Scalars ---

  /** Value of the occurrence, or `""` for a bare flag. */
  decodeString(name: string): string {
    const option = this.lookupScalar(name);
    const value = option.value ?? '';
    this.processed(name);
    return value;
  }

  /** Bare flag is true; otherwise one of `on|yes|y|off|no|n`. */
  decodeBool(name: string): boolean {
    const option = this.lookupScalar(name);
    let value: boolean;
    if (option.value === undefined || BOOL_TRUE.has(option.value)) {
      value = true;
    } else if (BOOL_FALSE.has(option.value)) {
      value = false;
    } else {
      throw new InvalidParameterValueError(option.name, 'on|yes|y|off|no|n');
    }
    this.processed(name);
    return value;
  }

  /**
   * Decode a signed 64-bit integer. Inside a list, `lower-upper` starts a
   * range whose first element is returned here; subsequent calls return
   * successive elements until `nextListElement` exhausts it.
   */
  decodeInt64(name: string): bigint {
    if (this._list.mode === 'signed-range') {
      return this._list.next;
    }
    const option = this.lookupScalar(name);
    const text = option.value ?? '';

    const whole = parseInt64(text);
    if (whole !== null) {
      this.processed(name);
      return whole;
    }

    if (this._list.mode === 'in-progress') {
      const range = this.parseRange(text, parseInt64Prefix, parseInt64);
      if (range) {
        this._list = { mode: 'signed-range', queue: this._list.queue, next: range[0], limit: range[1] };
        return range[0];
      }
    }
    throw new InvalidParameterValueError(
      option.name,
      this._list.mode === 'none' ? 'an int64 value' : 'an int64 value or range',
    );
  }

  /** Unsigned counterpart of {@link decodeInt64}. No sign is accepted. */
  decodeUint64(name: string): bigint {
    if (this._list.mode === 'unsigned-range') {
      return this._list.next;
    }
    const option = this.lookupScalar(name);
    const text = option.value ?? '';

    const whole = parseUint64(text);
    if (whole !== null) {
      this.processed(name);
      return whole;
    }

    if (this._list.mode === 'in-progress') {
      const range = this.parseRange(text, parseUint64Prefix, parseUint64);
      if (range) {
        this._list = { mode: 'unsigned-range', queue: this._list.queue, next: range[0], limit: range[1] };
        return range[0];
      }
    }
    throw new InvalidParameterValueError(
      option.name,
      this._list.mode === 'none' ? 'a uint64 value' : 'a uint64 value or range',
    );
  }

  /** Decode a byte size such as `4096`, `64k` or `1.5G`. Ranges are not accepted. */
  decodeSize(name: string): bigint {
    const option = this.lookupScalar(name);
    const value = parseSize(option.value ?? '');
    if (value === null) {
      throw new InvalidParameterValueError(
        option.name,
        'a size value representable as a non-negative 64-bit integer',
      );
    }
    this.processed(name);
    return value;
  }

  /** Decode one of `accepted`, matched exactly. */
  decodeEnum<T extends string>(name: string, accepted: readonly T[]): T {
    const option = this.lookupScalar(name);
    const tag = accepted.find(candidate => candidate === option.value);
    if (tag === undefined) {
      throw new InvalidParameterValueError(option.name, accepted.join('|'));
    }
    this.processed(name);
    return tag;
  }

  // --- Internals ---

  private get index(): UnprocessedIndex {
    if (!this._index) {
      throw new VisitorProtocolError('No struct is open');
    }
    return this._index;
  }

  private lookupDistinct(name: string): OptionQueue {
    const queue = this.index.lookup(name);
    if (!queue) {
      throw new MissingParameterError(name);
    }
    return queue;
  }

  /**
   * Occurrence a scalar decoder reads: outside a list the last occurrence of
   * `name` wins; inside a list it is the current element.
   */
  private lookupScalar(name: string): RawOption {
    const list = this._list;
    let option: RawOption | undefined;
    switch (list.mode) {
      case 'none':
        option = this.lookupDistinct(name).peekTail();
        break;
      case 'in-progress':
        option = list.queue.peekHead();
        break;
      default:
        throw new VisitorProtocolError(`Scalar '${name}' decoded in list state '${list.mode}'`);
    }
    if (!option) {
      throw new VisitorProtocolError(`No occurrence available for '${name}'`);
    }
    return option;
  }

  /** Outside a list, consume every occurrence of `name`. Inside one, popping is up to `nextListElement`. */
  private processed(name: string): void {
    if (this._list.mode === 'none') {
      this.index.remove(name);
    }
  }

  private popListOccurrence(queue: OptionQueue): boolean {
    if (!queue.popHead()) {
      throw new VisitorProtocolError(`nextListElement() after list '${queue.name}' was exhausted`);
    }
    if (queue.isEmpty) {
      this.index.remove(queue.name);
      return false;
    }
    return true;
  }

  /**
   * Split `lower-upper`: the leading integer must be followed by `-` and a
   * second integer spanning the rest of the text exactly.
   */
  private parseRange(
    text: string,
    parsePrefix: (text: string) => { value: bigint; rest: string } | null,
    parseWhole: (text: string) => bigint | null,
  ): [bigint, bigint] | null {
    const lower = parsePrefix(text);
    if (!lower || !lower.rest.startsWith('-')) return null;
    const upper = parseWhole(lower.rest.slice(1));
    if (upper === null || !isAcceptableRange(lower.value, upper)) return null;
    return [lower.value, upper];
  }
}
