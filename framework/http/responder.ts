/**
 * Responders
 *
 * A responder emits the status and headers of a response and hands back the
 * body writer. Middleware observes or rewrites the response by wrapping the
 * request's current responder in a filter.
 */

import type { ResponseBody, Responder, ResponseFilter } from './types.ts';
import { StringsMap } from './strings_map.ts';

/**
 * Responder that passes its arguments through a filter before delegating
 */
export class FilteredResponder implements Responder {
  constructor(
    private readonly inner: Responder,
    private readonly filter: ResponseFilter,
  ) {}

  respond(status: number, header: StringsMap): ResponseBody {
    const [filteredStatus, filteredHeader] = this.filter(status, header);
    return this.inner.respond(filteredStatus, filteredHeader);
  }
}

/**
 * Wrap a responder in a filter. The newest filter runs first.
 */
export function filterRespond(
  target: { responder: Responder },
  filter: ResponseFilter,
): void {
  target.responder = new FilteredResponder(target.responder, filter);
}

/**
 * In-memory responder that records what was emitted
 */
export class MemoryResponder implements Responder {
  status: number | null = null;
  header = StringsMap.headers();
  ended = false;
  private chunks: Uint8Array[] = [];
  private encoder = new TextEncoder();

  /**
   * Whether respond() has been called
   */
  get responded(): boolean {
    return this.status !== null;
  }

  respond(status: number, header: StringsMap): ResponseBody {
    if (this.responded) {
      throw new Error('Response already sent');
    }
    this.status = status;
    this.header = StringsMap.headers(header);

    return {
      write: (chunk) => {
        if (this.ended) {
          throw new Error('Response body already ended');
        }
        this.chunks.push(typeof chunk === 'string' ? this.encoder.encode(chunk) : chunk);
      },
      end: () => {
        this.ended = true;
      },
    };
  }

  /**
   * Body written so far, decoded as UTF-8
   */
  get body(): string {
    const decoder = new TextDecoder();
    return this.chunks.map((chunk) => decoder.decode(chunk, { stream: true })).join('') +
      decoder.decode();
  }
}
