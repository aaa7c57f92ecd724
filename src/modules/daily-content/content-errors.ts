export type ContentErrorKind = 'provider_unavailable' | 'generation_malformed' | 'internal_error';

/** Raised by the generator when a day's content cannot be produced. */
export class ContentGenerationError extends Error {
  constructor(
    readonly kind: ContentErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'ContentGenerationError';
  }
}

/** A provider answered, but not with something a recipe can use. Consumes a generation round. */
export class MalformedContentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedContentError';
  }
}
