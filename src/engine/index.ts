// Artifact layer
export { ArtifactLayer } from "./artifact-layer.js";
export type { ArtifactLayerOptions } from "./artifact-layer.js";
// Caching
export { CachingInterceptor } from "./caching-interceptor.js";
export type { CachingInterceptorOptions } from "./caching-interceptor.js";
// Pipeline
export { createPipeline, Pipeline } from "./pipeline.js";
export type { PipelineOptions } from "./pipeline.js";
// Semaphore
export { Semaphore } from "./semaphore.js";

// Types
export type {
  AddResult,
  DeleteOpts,
  DeleteResult,
  GCOpts,
  GCResult,
  InterceptorStats,
  OnReadError,
  ReadOpts,
  Transformer,
} from "./types.js";
