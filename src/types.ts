export type NamespaceBody = string | Readonly<Record<string, unknown>>;

export interface NamespaceDescriptor {
  readonly id: string;
  readonly label: string;
  readonly summary: string;
}

export interface NamespaceContent {
  readonly id: string;
  readonly body: NamespaceBody;
}

export interface Query {
  id: string;
  text: string;
  timestamp: Date;
}

export type UnmatchedReason =
  | 'no_match'
  | 'unknown_namespace'
  | 'empty_response'
  | 'service_error';

export type ClassificationResult =
  | { kind: 'matched'; namespaceId: string }
  | { kind: 'unmatched'; reason: UnmatchedReason; detail?: string };

export type AnswerStatus = 'answered' | 'no_match' | 'failed';

export interface Answer {
  text: string;
  sourceNamespaceId: string | null;
  status: AnswerStatus;
  diagnostic?: string;
}

export type PipelineState =
  | 'received'
  | 'classified'
  | 'answered'
  | 'no_match_answered'
  | 'failed';

/**
 * Opaque prompt-to-text boundary. Implementations throw `ServiceError` on failure.
 */
export interface GenerationCapability {
  generate(prompt: string, instructions?: string): Promise<string>;
}
