import { withProvenance } from "../artifacts/hash.js";
import { type Document, OUTPUT_INDEX_KEY, TRANSFORMER_KEY } from "../artifacts/types.js";
import { componentLogger, type Logger } from "../logging/index.js";
import type { ArtifactLayer } from "./artifact-layer.js";
import { Semaphore } from "./semaphore.js";
import type { InterceptorStats, Transformer } from "./types.js";

export interface CachingInterceptorOptions {
  layer: ArtifactLayer;
  transformer: Transformer;
  /** Documents transformed in parallel (default: 1) */
  concurrency?: number;
  logger?: Logger;
}

/**
 * Makes one transformation step skip-on-repeat per input document.
 *
 * A document is a cache hit when its logical id is known to the layer and
 * the layer holds children of its hash produced by this transformer. Hits
 * return the stored children; misses run the transformer on that single
 * document, relink each output to the input (parent_hashes = [input hash],
 * metadata.transformer = name, metadata.output_index = position) and store
 * input + outputs together.
 *
 * Output order follows input order, each input contributing its outputs
 * contiguously. An input repeated within one call is transformed once. A
 * transformer that returns no outputs leaves nothing to find and runs again
 * next time.
 */
export class CachingInterceptor implements Transformer {
  readonly name: string;
  private readonly layer: ArtifactLayer;
  private readonly transformer: Transformer;
  private readonly concurrency: number;
  private readonly limiter: Semaphore;
  private readonly log: Logger;
  private hits = 0;
  private misses = 0;

  constructor(opts: CachingInterceptorOptions) {
    this.layer = opts.layer;
    this.transformer = opts.transformer;
    this.concurrency = opts.concurrency ?? 1;
    this.limiter = new Semaphore(this.concurrency);
    this.name = `cached(${opts.transformer.name})`;
    this.log = componentLogger("caching-interceptor", opts.logger).child({
      transformer: opts.transformer.name,
    });
  }

  async transform(documents: Document[]): Promise<Document[]> {
    if (documents.length === 0) return [];
    const known = await this.layer.exists(documents.map((d) => d.id));

    // Each distinct input is processed once; repeats reuse its outputs
    const distinct = new Map<string, { doc: Document; known: boolean }>();
    documents.forEach((doc, i) => {
      if (!distinct.has(doc.hash)) distinct.set(doc.hash, { doc, known: known[i] ?? false });
    });
    const pending = [...distinct.values()];
    const outputsByHash = new Map<string, Document[]>();

    if (this.concurrency === 1) {
      for (const { doc, known: maybeCached } of pending) {
        outputsByHash.set(doc.hash, await this.process(doc, maybeCached));
      }
    } else {
      // Parallel: queued documents stop starting once one has failed, and
      // in-flight ones are awaited before the failure is rethrown.
      let failed = false;
      const tasks = pending.map(({ doc, known: maybeCached }) =>
        this.limiter.run(async () => {
          if (failed) return [];
          try {
            return await this.process(doc, maybeCached);
          } catch (err) {
            failed = true;
            throw err;
          }
        }),
      );
      const settled = await Promise.allSettled(tasks);
      settled.forEach((outcome, i) => {
        if (outcome.status === "rejected") throw outcome.reason;
        const entry = pending[i];
        if (entry) outputsByHash.set(entry.doc.hash, outcome.value);
      });
    }

    return documents.flatMap((doc) => outputsByHash.get(doc.hash) ?? []);
  }

  private async process(doc: Document, maybeCached: boolean): Promise<Document[]> {
    if (maybeCached) {
      const cached = await this.layer.getChildDocuments(doc.hash, {
        transformer: this.transformer.name,
      });
      if (cached.length > 0) {
        this.hits++;
        this.log.debug({ id: doc.id, hash: doc.hash, outputs: cached.length }, "cache hit");
        return cached;
      }
    }

    this.misses++;
    const outputs = await this.transformer.transform([doc]);
    // Ordinal keeps identical outputs apart: each gets its own hash and record
    const linked = outputs.map((output, i) =>
      withProvenance(output, [doc.hash], {
        [TRANSFORMER_KEY]: this.transformer.name,
        [OUTPUT_INDEX_KEY]: i,
      }),
    );
    // The input is stored too: children may only reference indexed parents,
    // and its logical id must be known for the next lookup.
    await this.layer.add([doc, ...linked], { mode: "skip" });
    this.log.debug({ id: doc.id, hash: doc.hash, outputs: linked.length }, "cache miss");
    return linked;
  }

  stats(): InterceptorStats {
    return { hits: this.hits, misses: this.misses };
  }
}
