// packages/core/src/models/transport.ts

/** One request to the reasoning or verification model. */
export interface CompletionRequest {
  system: string;
  user: string;
  /** Screenshot attached to the request, when there is one. */
  imagePath?: string | null;
}

/**
 * Text-in, text-out access to a model. Implementations throw ModelError on
 * transport faults and timeouts; callers decide what a fault means.
 */
export interface ModelTransport {
  readonly name: string;
  complete(request: CompletionRequest): Promise<string>;
}
