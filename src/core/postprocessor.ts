/**
 * Postprocessor: ordered tree rewrites run after the document is built.
 *
 * Passes come from a {@link Registry} and run in its resolved order. The
 * input document is cloned first, so callers keep their copy and running
 * the postprocessor again on its own output is safe.
 *
 * @module core/postprocessor
 */
import { createLogger } from './logger.js';
import type { Document, PassContext, PostprocessorPass } from './types.js';

const log = createLogger('postprocess');

export class Postprocessor {
  /**
   * @param passes - Passes in resolved registry order.
   */
  constructor(private readonly passes: readonly PostprocessorPass[]) {}

  get passNames(): string[] {
    return this.passes.map((pass) => pass.name);
  }

  /**
   * Run every pass over a copy of `document`.
   */
  process(document: Document): Document {
    const result = structuredClone(document);
    const context: PassContext = {
      warn: (message) => {
        log(message);
        result.metadata.warnings.push(message);
      },
    };

    for (const pass of this.passes) {
      log('running %s', pass.name);
      pass.run(result, context);
    }
    return result;
  }
}
