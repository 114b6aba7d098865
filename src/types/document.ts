/**
 * Document types produced by replaying a CSV file.
 *
 * Every data row becomes one DocumentObject. Internal nodes are objects
 * (name-keyed) or arrays (index-keyed); leaves are numbers or strings.
 * `null` only appears as the placeholder for a missing array index.
 */

export type DocumentScalar = string | number | null;

export type DocumentValue = DocumentScalar | DocumentObject | DocumentValue[];

export interface DocumentObject {
  [key: string]: DocumentValue;
}

/**
 * True for plain object nodes (not arrays, not leaves)
 */
export function isDocumentObject(value: DocumentValue | undefined): value is DocumentObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * The empty document is the end-of-data sentinel returned by Replay.advance()
 */
export function isEndOfData(document: DocumentObject): boolean {
  return Object.keys(document).length === 0;
}
