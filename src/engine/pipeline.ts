import type { Document } from "../artifacts/types.js";
import type { Logger } from "../logging/index.js";
import type { ArtifactLayer } from "./artifact-layer.js";
import { CachingInterceptor } from "./caching-interceptor.js";
import type { InterceptorStats, Transformer } from "./types.js";

export interface PipelineOptions {
  concurrency?: number;
  logger?: Logger;
}

/**
 * Sequential transformers, each step cached through its own interceptor
 * over the same layer. Step N's outputs are step N+1's inputs.
 */
export class Pipeline implements Transformer {
  readonly name: string;
  readonly steps: readonly CachingInterceptor[];

  constructor(
    layer: ArtifactLayer,
    transformers: readonly Transformer[],
    opts: PipelineOptions = {},
  ) {
    if (transformers.length === 0) {
      throw new Error("Pipeline requires at least one transformer");
    }
    this.steps = transformers.map(
      (transformer) =>
        new CachingInterceptor({
          layer,
          transformer,
          concurrency: opts.concurrency,
          logger: opts.logger,
        }),
    );
    this.name = transformers.map((t) => t.name).join(" > ");
  }

  async transform(documents: Document[]): Promise<Document[]> {
    let current = documents;
    for (const step of this.steps) {
      current = await step.transform(current);
    }
    return current;
  }

  stats(): InterceptorStats[] {
    return this.steps.map((step) => step.stats());
  }
}

export function createPipeline(
  layer: ArtifactLayer,
  transformers: readonly Transformer[],
  opts: PipelineOptions = {},
): Pipeline {
  return new Pipeline(layer, transformers, opts);
}
