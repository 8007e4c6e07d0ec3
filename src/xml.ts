// src/xml.ts
// DOM access shared by the three extractors. Paths are element-tree style:
// "a/b" walks direct children, "*" matches any element. Every step matches
// the local name within one namespace (null for un-namespaced documents).

import { JSDOM } from 'jsdom';

import { MalformedDocumentError, type DocumentKind } from './errors';

export type XmlNamespace = string | null;

const { DOMParser } = new JSDOM('').window;

// ---------------- parsing ----------------

export function parseXmlDocument(xmlText: string, kind: DocumentKind): Document {
  let doc: Document;
  try {
    doc = new DOMParser().parseFromString(xmlText, 'application/xml');
  } catch (err) {
    throw new MalformedDocumentError(kind, `invalid XML: ${err instanceof Error ? err.message : String(err)}`);
  }
  const error = doc.getElementsByTagName('parsererror')[0];
  if (error) throw new MalformedDocumentError(kind, `invalid XML: ${(error.textContent ?? '').trim()}`);
  return doc;
}

// ---------------- navigation ----------------

export function children(el: Element, path: string, ns: XmlNamespace = null): Element[] {
  let current: Element[] = [el];
  for (const step of path.split('/')) {
    current = current.flatMap(e =>
      Array.from(e.children).filter(c => step === '*' || (c.localName === step && c.namespaceURI === ns)),
    );
  }
  return current;
}

export function firstChild(el: Element, path: string, ns: XmlNamespace = null): Element | undefined {
  return children(el, path, ns)[0];
}

/** All descendants (not el itself) with the given local name, in document order. */
export function descendants(el: Element, name: string, ns: XmlNamespace = null): Element[] {
  return Array.from(el.getElementsByTagNameNS(ns, name));
}

// ---------------- text ----------------

function directText(el: Element | undefined): string | undefined {
  return el ? (el.textContent ?? '').trim() : undefined;
}

export function optionalText(el: Element, path: string, ns: XmlNamespace = null): string | undefined {
  return directText(firstChild(el, path, ns));
}

/** Text of the first element at path; absent or blank is a malformed document. */
export function requireText(
  el: Element,
  path: string,
  kind: DocumentKind,
  ns: XmlNamespace = null,
  context?: Record<string, unknown>,
): string {
  const text = optionalText(el, path, ns);
  if (!text) {
    throw new MalformedDocumentError(kind, `<${el.localName}> is missing <${path}>`, context);
  }
  return text;
}
