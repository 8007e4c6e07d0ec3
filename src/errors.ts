// src/errors.ts
/**
 * Error hierarchy for model construction.
 * Every genuine parse failure propagates to the caller; skipped route
 * destinations and a missing route table are not errors.
 */

export type DocumentKind = 'policies' | 'routes' | 'zones';

/**
 * Base error class for all model errors
 */
export class FirewallModelError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A required element is absent, its text does not parse, or the document is
 * not well-formed XML.
 */
export class MalformedDocumentError extends FirewallModelError {
  public readonly document: DocumentKind;

  constructor(document: DocumentKind, message: string, context?: Record<string, unknown>) {
    super(`${document} document: ${message}`, 'MALFORMED_DOCUMENT', { document, ...context });
    this.document = document;
  }
}

/**
 * An address-set member names an entry not (yet) defined in its zone's
 * address book.
 */
export class UnresolvedReferenceError extends FirewallModelError {
  public readonly zone: string;
  public readonly entry: string;
  public readonly reference: string;

  constructor(zone: string, entry: string, reference: string) {
    super(
      `zone '${zone}': address-set '${entry}' references undefined address '${reference}'`,
      'UNRESOLVED_REFERENCE',
      { zone, entry, reference },
    );
    this.zone = zone;
    this.entry = entry;
    this.reference = reference;
  }
}
