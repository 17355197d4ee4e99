/**
 * Error classes for topology and routing document parsing
 *
 * Parse errors are fatal: no partial model is ever returned. Each error names
 * the document and the field that failed so operators can fix the input.
 */

/** Which input document an error refers to */
export type NetworkDocument = 'topology' | 'routing';

/**
 * Base error class for all network parse failures
 */
export class NetworkParseError extends Error {
  constructor(
    message: string,
    public readonly document: NetworkDocument,
    public readonly field: string
  ) {
    super(`${document}: ${message}`);
    this.name = 'NetworkParseError';
    Object.setPrototypeOf(this, NetworkParseError.prototype);
  }
}

/**
 * Error thrown when a document is not well-formed XML, a required element or
 * attribute is missing, or a value breaks a structural rule
 */
export class MalformedInputError extends NetworkParseError {
  constructor(message: string, document: NetworkDocument, field: string) {
    super(message, document, field);
    this.name = 'MalformedInputError';
    Object.setPrototypeOf(this, MalformedInputError.prototype);
  }
}

/**
 * Error thrown when an interface is not attached to any link
 */
export class DanglingInterfaceError extends NetworkParseError {
  constructor(
    public readonly router: string,
    public readonly interfaceName: string
  ) {
    super(
      `Interface ${router}.${interfaceName} is not attached to any link`,
      'topology',
      `router[${router}].interface[${interfaceName}]`
    );
    this.name = 'DanglingInterfaceError';
    Object.setPrototypeOf(this, DanglingInterfaceError.prototype);
  }
}

/**
 * Error thrown when a link or routing entry names a router or interface the
 * topology document does not declare
 */
export class UnknownReferenceError extends NetworkParseError {
  constructor(
    document: NetworkDocument,
    field: string,
    public readonly kind: 'router' | 'interface',
    public readonly reference: string
  ) {
    super(`Unknown ${kind} '${reference}' referenced by ${field}`, document, field);
    this.name = 'UnknownReferenceError';
    Object.setPrototypeOf(this, UnknownReferenceError.prototype);
  }
}
