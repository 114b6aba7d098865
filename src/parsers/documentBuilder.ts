import type { DocumentObject, DocumentValue } from '../types/document';
import { isDocumentObject } from '../types/document';
import type { KeyPath, PathSegment } from '../types/path';
import { MAX_ARRAY_INDEX, isIndexSegment } from '../types/path';
import type { ArrayStrategy } from '../types/replay';
import { parseScalar } from './scalar';

/**
 * One column of a row: where it goes and its untyped value
 */
interface FieldEntry {
  path: KeyPath;
  raw: string;
}

/**
 * Indexed columns sharing one base path, e.g. signal[0], signal[2]
 */
interface ArrayGroup {
  base: string[];
  items: Map<number, FieldEntry[]>;
}

type Container = DocumentObject | DocumentValue[];

/**
 * Walk to the object at `names`, creating missing nodes and replacing
 * any node that is not an object
 */
function ensureObject(root: DocumentObject, names: readonly string[]): DocumentObject {
  let node = root;
  for (const name of names) {
    const next = node[name];
    if (isDocumentObject(next)) {
      node = next;
    } else {
      const child: DocumentObject = {};
      node[name] = child;
      node = child;
    }
  }
  return node;
}

function assignAt(root: DocumentObject, names: readonly string[], value: DocumentValue): void {
  const parent = ensureObject(root, names.slice(0, -1));
  parent[names[names.length - 1]] = value;
}

/**
 * Object levels cannot be indexed, so a leading index segment is used as a key
 */
function leadingName(path: KeyPath): KeyPath {
  return isIndexSegment(path[0]) ? [String(path[0]), ...path.slice(1)] : path;
}

/**
 * Build the value of one array element from the columns that target it.
 * A column ending at the index gives a scalar, columns continuing with a
 * name (wheels[0].pressure) give an object and columns continuing with an
 * index (matrix[0][1]) give a nested array. The last column decides which.
 */
function buildElement(entries: FieldEntry[]): DocumentValue {
  const last = entries[entries.length - 1];
  if (last.path.length === 0) {
    return parseScalar(last.raw);
  }

  if (isIndexSegment(last.path[0])) {
    const items = new Map<number, FieldEntry[]>();
    for (const entry of entries) {
      const [head, ...rest] = entry.path;
      if (head !== undefined && isIndexSegment(head)) {
        const bucket = items.get(head) ?? [];
        bucket.push({ path: rest, raw: entry.raw });
        items.set(head, bucket);
      }
    }
    return buildArray(items);
  }

  return buildGrouped(entries.filter(entry => entry.path.length > 0 && !isIndexSegment(entry.path[0])));
}

function buildArray(items: Map<number, FieldEntry[]>): DocumentValue[] {
  const max = Math.max(...items.keys());
  const values: DocumentValue[] = [];
  for (let index = 0; index <= max; index++) {
    const entries = items.get(index);
    values.push(entries ? buildElement(entries) : null);
  }
  return values;
}

/**
 * Grouped-array assignment.
 *
 * Plain paths are written straight away. Indexed paths are bucketed by base
 * path and emitted afterwards as dense arrays of length max+1, with null in
 * every index no column supplied. Column order inside a group does not
 * change the result.
 */
function buildGrouped(entries: readonly FieldEntry[]): DocumentObject {
  const document: DocumentObject = {};
  const groups = new Map<string, ArrayGroup>();

  for (const entry of entries) {
    const path = leadingName(entry.path);
    const base: string[] = [];
    let split = -1;
    let index = 0;

    for (let i = 0; i < path.length; i++) {
      const segment = path[i];
      if (isIndexSegment(segment)) {
        split = i;
        index = segment;
        break;
      }
      base.push(segment);
    }

    if (split === -1) {
      assignAt(document, base, parseScalar(entry.raw));
      continue;
    }

    const key = JSON.stringify(base);
    let group = groups.get(key);
    if (!group) {
      group = { base, items: new Map() };
      groups.set(key, group);
    }

    const items = group.items.get(index) ?? [];
    items.push({ path: path.slice(split + 1), raw: entry.raw });
    group.items.set(index, items);
  }

  for (const group of groups.values()) {
    assignAt(document, group.base, buildArray(group.items));
  }

  return document;
}

function getChild(node: Container, segment: PathSegment): DocumentValue | undefined {
  if (Array.isArray(node)) {
    return isIndexSegment(segment) ? node[segment] : undefined;
  }
  return node[String(segment)];
}

function setChild(node: Container, segment: PathSegment, value: DocumentValue): void {
  if (!Array.isArray(node)) {
    node[String(segment)] = value;
    return;
  }
  if (isIndexSegment(segment)) {
    while (node.length < segment) {
      node.push(null);
    }
    node[segment] = value;
  }
}

/**
 * An existing node can be reused when it can be addressed by `next`:
 * objects take any segment, arrays only indices
 */
function reusable(node: DocumentValue | undefined, next: PathSegment): node is Container {
  if (Array.isArray(node)) {
    return isIndexSegment(next);
  }
  return isDocumentObject(node);
}

/**
 * Pointer-style assignment: write the value at the path, creating arrays
 * for index segments and objects for names. Arrays grow with null padding.
 */
function assignPointer(root: DocumentObject, path: KeyPath, value: DocumentValue): void {
  let node: Container = root;

  for (let i = 0; i < path.length - 1; i++) {
    const segment = path[i];
    const next = path[i + 1];
    const existing = getChild(node, segment);

    if (reusable(existing, next)) {
      node = existing;
    } else {
      const created: Container = isIndexSegment(next) ? [] : {};
      setChild(node, segment, created);
      node = created;
    }
  }

  setChild(node, path[path.length - 1], value);
}

/**
 * Paths handed in directly may carry indices compileHeaders would not produce
 */
function limitIndices(path: KeyPath): KeyPath {
  if (!path.some(segment => isIndexSegment(segment) && !isUsableIndex(segment))) {
    return path;
  }
  return path.map(segment => (isIndexSegment(segment) && !isUsableIndex(segment) ? String(segment) : segment));
}

function isUsableIndex(index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index <= MAX_ARRAY_INDEX;
}

/**
 * Build the document for one row.
 * Only columns present in both the header and the row are used.
 */
export function buildDocument(
  headers: readonly KeyPath[],
  row: readonly string[],
  strategy: ArrayStrategy = 'grouped'
): DocumentObject {
  const count = Math.min(headers.length, row.length);

  if (strategy === 'pointer') {
    const document: DocumentObject = {};
    for (let i = 0; i < count; i++) {
      assignPointer(document, limitIndices(headers[i]), parseScalar(row[i]));
    }
    return document;
  }

  const entries: FieldEntry[] = [];
  for (let i = 0; i < count; i++) {
    entries.push({ path: limitIndices(headers[i]), raw: row[i] });
  }
  return buildGrouped(entries);
}
