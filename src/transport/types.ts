import type { InsertionMarker } from '../thread/buffer.js';
import type { Message } from '../thread/model.js';

/**
 * The language-model collaborator.
 *
 * `send` is called once per response. It writes generated text through
 * `marker.insert()` as it arrives and may return a promise that settles when
 * generation ends.
 */
export interface Transport {
  send(messages: readonly Message[], marker: InsertionMarker): void | Promise<void>;
}
