export type PageKitErrorKind =
  | 'malformed_address'
  | 'unknown_type'
  | 'unknown_tool'
  | 'duplicate_registration'
  | 'blocking_dispatch'
  | 'address_mismatch'
  | 'provenance'
  | 'invalid_tool'
  | 'invalid_parameters'
  | 'execution_error'
  | 'no_results'
  | 'context';

export interface PageKitErrorMeaning {
  recoverable: boolean;
  summary: string;
}

export const KIND_MEANINGS: Record<PageKitErrorKind, PageKitErrorMeaning> = {
  malformed_address: {
    recoverable: false,
    summary: 'Address string does not match root/type:id[@version] or breaks a field rule.',
  },
  unknown_type: {
    recoverable: false,
    summary: 'No producer is routed for the requested type or alias.',
  },
  unknown_tool: {
    recoverable: false,
    summary: 'No tool is registered under the requested name.',
  },
  duplicate_registration: {
    recoverable: false,
    summary: 'A producer or alias is already registered under that name.',
  },
  blocking_dispatch: {
    recoverable: false,
    summary: 'A suspending producer or store was reached from a blocking call.',
  },
  address_mismatch: {
    recoverable: false,
    summary: 'A producer returned a page whose address differs from the requested one.',
  },
  provenance: {
    recoverable: false,
    summary: 'A parent link is missing, unversioned, same-typed or cyclic.',
  },
  invalid_tool: {
    recoverable: false,
    summary: 'Tool options were rejected at registration time.',
  },
  invalid_parameters: {
    recoverable: true,
    summary: 'Tool input or cursor failed validation before execution.',
  },
  execution_error: {
    recoverable: true,
    summary: 'The wrapped retrieval function failed after being invoked.',
  },
  no_results: {
    recoverable: true,
    summary: 'The retrieval function found nothing for the given input.',
  },
  context: {
    recoverable: false,
    summary: 'The global context was installed twice or read before installation.',
  },
};

export class PageKitError extends Error {
  readonly kind: PageKitErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: PageKitErrorKind, message: string, opts?: { details?: Record<string, unknown>; cause?: unknown }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'PageKitError';
    this.kind = kind;
    if (opts?.details !== undefined) {
      this.details = opts.details;
    }
  }
}

export class MalformedAddressError extends PageKitError {
  readonly input: string;

  constructor(input: string, reason: string) {
    super('malformed_address', `Malformed page address '${input}': ${reason}`, { details: { input } });
    this.name = 'MalformedAddressError';
    this.input = input;
  }
}

export class UnknownTypeError extends PageKitError {
  readonly type: string;

  constructor(type: string) {
    super('unknown_type', `No producer registered for type: ${type}`, { details: { type } });
    this.name = 'UnknownTypeError';
    this.type = type;
  }
}

export class UnknownToolError extends PageKitError {
  readonly tool: string;

  constructor(tool: string) {
    super('unknown_tool', `Tool '${tool}' not found`, { details: { tool } });
    this.name = 'UnknownToolError';
    this.tool = tool;
  }
}

export class DuplicateRegistrationError extends PageKitError {
  constructor(message: string, name: string) {
    super('duplicate_registration', message, { details: { name } });
    this.name = 'DuplicateRegistrationError';
  }
}

export class BlockingDispatchError extends PageKitError {
  constructor(message: string) {
    super('blocking_dispatch', message);
    this.name = 'BlockingDispatchError';
  }
}

export class AddressMismatchError extends PageKitError {
  constructor(requested: string, produced: string) {
    super('address_mismatch', `Producer for ${requested} returned a page addressed ${produced}`, { details: { requested, produced } });
    this.name = 'AddressMismatchError';
  }
}

export class ProvenanceError extends PageKitError {
  constructor(message: string) {
    super('provenance', message);
    this.name = 'ProvenanceError';
  }
}

export class InvalidToolError extends PageKitError {
  constructor(tool: string, reason: string) {
    super('invalid_tool', `Tool "${tool}" ${reason}`, { details: { tool } });
    this.name = 'InvalidToolError';
  }
}

export class ToolExecutionError extends PageKitError {
  constructor(kind: 'invalid_parameters' | 'execution_error', message: string, opts?: { details?: Record<string, unknown>; cause?: unknown }) {
    super(kind, message, opts);
    this.name = 'ToolExecutionError';
  }
}

// Thrown by retrieval functions to signal an empty hit; invoke() turns it into a not-found response.
export class NoResultsError extends PageKitError {
  constructor(message = 'No matching documents found') {
    super('no_results', message);
    this.name = 'NoResultsError';
  }
}

export class ContextError extends PageKitError {
  constructor(message: string) {
    super('context', message);
    this.name = 'ContextError';
  }
}

export const isPageKitError = (value: unknown): value is PageKitError =>
  value instanceof PageKitError;

export const isRecoverableKind = (kind: PageKitErrorKind): boolean =>
  KIND_MEANINGS[kind].recoverable;

export const describeError = (value: unknown): string => {
  if (value instanceof Error && typeof value.message === 'string') return value.message;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return value.toString();
  }
  if (value === null) return 'null';
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      return '[unserializable-error]';
    }
  }
  return 'unknown_error';
};
