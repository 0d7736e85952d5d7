/**
 * Error thrown by header-map operations that cannot degrade to a diagnostic.
 */
export class HeaderMapError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = "HeaderMapError";
  }
}

/** Error codes */
export const HeaderMapErrorCode = {
  RESOURCE_NOT_FOUND: "header-map/resource-not-found",
  PROPERTIES_SYNTAX: "header-map/properties-syntax",
  SEALED: "header-map/sealed",
  INVALID_OUTPUT_STYLE: "header-map/invalid-output-style",
} as const;

export type HeaderMapErrorCodeType = (typeof HeaderMapErrorCode)[keyof typeof HeaderMapErrorCode];

/** A named mapping resource does not exist anywhere the loader looks. */
export class MappingResourceNotFoundError extends HeaderMapError {
  constructor(public readonly resource: string) {
    super(`Mapping resource not found: ${resource}`, HeaderMapErrorCode.RESOURCE_NOT_FOUND);
    this.name = "MappingResourceNotFoundError";
  }
}

export class PropertiesSyntaxError extends HeaderMapError {
  constructor(
    message: string,
    public readonly line: number,
  ) {
    super(`${message} (line ${line})`, HeaderMapErrorCode.PROPERTIES_SYNTAX);
    this.name = "PropertiesSyntaxError";
  }
}

/** Mutation attempted after the resolver entered its query phase. */
export class HeaderMapStateError extends HeaderMapError {
  constructor(operation: string) {
    super(`Cannot ${operation}: header map is sealed`, HeaderMapErrorCode.SEALED);
    this.name = "HeaderMapStateError";
  }
}
