import type { OptionQueue } from './UnprocessedIndex';

/**
 * State of the (single, non-nestable) list being traversed.
 *
 * - `none`: no list is active.
 * - `started`: `beginList` succeeded, no element requested yet.
 * - `in-progress`: the queue head is the current element. Requesting the next
 *   element consumes it.
 * - `signed-range` / `unsigned-range`: the queue head encoded an interval
 *   `lower-upper`; `next` is the current element. The head is consumed only
 *   once `next` reaches `limit`.
 */
export type ListState =
  | { readonly mode: 'none' }
  | { readonly mode: 'started'; readonly queue: OptionQueue }
  | { readonly mode: 'in-progress'; readonly queue: OptionQueue }
  | { readonly mode: 'signed-range'; readonly queue: OptionQueue; next: bigint; readonly limit: bigint }
  | { readonly mode: 'unsigned-range'; readonly queue: OptionQueue; next: bigint; readonly limit: bigint };

export type ListMode = ListState['mode'];

export const NO_LIST: ListState = { mode: 'none' };
