export type PipelineErrorKind =
  | 'retrieval_failed'
  | 'no_papers_found'
  | 'all_tasks_failed'
  | 'deadline_exceeded';

interface PipelineErrorDescriptor {
  code: string;
  statusCode: number;
  message: string;
}

const DESCRIPTORS: Record<PipelineErrorKind, PipelineErrorDescriptor> = {
  retrieval_failed: {
    code: 'RETRIEVAL_FAILED',
    statusCode: 502,
    message: 'The paper search service is unavailable right now. Please try again later.',
  },
  no_papers_found: {
    code: 'NO_PAPERS_FOUND',
    statusCode: 404,
    message: 'No papers matched this query. Try a broader or differently worded query.',
  },
  all_tasks_failed: {
    code: 'ALL_TASKS_FAILED',
    statusCode: 503,
    message: 'The analysis service could not produce any results. Please try again later.',
  },
  deadline_exceeded: {
    code: 'DEADLINE_EXCEEDED',
    statusCode: 504,
    message: 'The analysis did not finish within the allotted time.',
  },
};

/**
 * Pipeline-level failure surfaced to the Backend. `message` is user-facing;
 * the underlying cause is kept on `cause` for logs only.
 */
export class PipelineError extends Error {
  public readonly code: string;
  public readonly statusCode: number;

  constructor(
    public readonly kind: PipelineErrorKind,
    public readonly warnings: readonly string[] = [],
    cause?: unknown
  ) {
    const descriptor = DESCRIPTORS[kind];
    super(descriptor.message);
    this.name = 'PipelineError';
    this.code = descriptor.code;
    this.statusCode = descriptor.statusCode;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}
