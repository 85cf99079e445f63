// packages/core/src/types/models.ts

export interface Candidate {
  text: string;
  finishReason?: string;
}

export interface GenerateResponse {
  /** Empty when the service declined to answer. */
  candidates: Candidate[];
  usage: { totalTokens: number };
}

/**
 * The remote language model as the analysis controller sees it.
 * Implementations throw on transport or service errors.
 */
export interface RemoteModel {
  readonly name: string;
  generate(prompt: string): Promise<GenerateResponse>;
}
