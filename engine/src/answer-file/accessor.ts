/**
 * answerkit Engine — Namespace-Aware Document Accessor
 *
 * Every lookup matches namespace URI and local name exactly. An element
 * with the right local name in another namespace counts as absent, so
 * find-or-create adds a correctly namespaced sibling next to it.
 */

import type { ComponentName, PassName } from "../types";
import {
  NAMESPACES,
  NAMESPACE_KEYS,
  ROOT_ELEMENT,
  XMLNS_URI,
  namespaceUri,
} from "./namespaces";
import type { Namespace } from "./namespaces";

// DOM node types (no global Node constructor outside the browser)
export const ELEMENT_NODE = 1;
export const TEXT_NODE = 3;
export const CDATA_SECTION_NODE = 4;
export const PROCESSING_INSTRUCTION_NODE = 7;
export const COMMENT_NODE = 8;

export const SHELL_SETUP: ComponentName = "Microsoft-Windows-Shell-Setup";
export const DEPLOYMENT: ComponentName = "Microsoft-Windows-Deployment";

/** Fixed attributes written on every component this engine creates */
export const COMPONENT_ATTRIBUTES = {
  processorArchitecture: "amd64",
  publicKeyToken: "31bf3856ad364e35",
  language: "neutral",
  versionScope: "nonSxS",
} as const;

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

export function childElements(parent: Element): Element[] {
  const elements: Element[] = [];
  for (let i = 0; i < parent.childNodes.length; i++) {
    const node = parent.childNodes.item(i);
    if (isElement(node)) elements.push(node);
  }
  return elements;
}

// ─── Root & Declarations ─────────────────────────────────────────

export function rootElement(doc: Document): Element | null {
  for (let i = 0; i < doc.childNodes.length; i++) {
    const node = doc.childNodes.item(i);
    if (isElement(node)) return node;
  }
  return null;
}

/**
 * Prefix bound to `uri` by a declaration on `root`: "" for the default
 * namespace, null when undeclared.
 */
export function declaredPrefix(root: Element, uri: string): string | null {
  for (let i = 0; i < root.attributes.length; i++) {
    const attr = root.attributes.item(i);
    if (!attr || attr.value !== uri) continue;
    if (attr.name === "xmlns") return "";
    if (attr.name.startsWith("xmlns:")) return attr.name.slice("xmlns:".length);
  }
  return null;
}

function isPrefixTaken(root: Element, prefix: string): boolean {
  return root.hasAttribute(prefix === "" ? "xmlns" : `xmlns:${prefix}`);
}

function declareNamespace(root: Element, ns: Namespace): void {
  const { uri, prefix: preferred } = NAMESPACES[ns];
  if (declaredPrefix(root, uri) !== null) return;

  let prefix: string = preferred;
  for (let n = 1; isPrefixTaken(root, prefix); n++) {
    prefix = `${preferred || "ns"}${n}`;
  }
  root.setAttributeNS(XMLNS_URI, prefix === "" ? "xmlns" : `xmlns:${prefix}`, uri);
}

/**
 * Return the root element, synthesising `<unattend>` when the document has
 * none, and make sure every namespace is declared on it.
 */
export function ensureRoot(doc: Document): Element {
  let root = rootElement(doc);
  if (!root) {
    root = doc.createElementNS(namespaceUri("unattend"), ROOT_ELEMENT);
    doc.appendChild(root);
  }
  for (const ns of NAMESPACE_KEYS) {
    declareNamespace(root, ns);
  }
  return root;
}

function qualifiedName(doc: Document, ns: Namespace, localName: string): string {
  const prefix = declaredPrefix(ensureRoot(doc), namespaceUri(ns));
  return prefix ? `${prefix}:${localName}` : localName;
}

export function createElement(doc: Document, ns: Namespace, localName: string): Element {
  return doc.createElementNS(namespaceUri(ns), qualifiedName(doc, ns, localName));
}

/** Mark a list item with wcm:action="add" */
export function markAdded(el: Element): void {
  const doc = el.ownerDocument;
  el.setAttributeNS(namespaceUri("wcm"), qualifiedName(doc, "wcm", "action"), "add");
}

// ─── Children ────────────────────────────────────────────────────

export function isNamed(el: Element, ns: Namespace, localName: string): boolean {
  return el.namespaceURI === namespaceUri(ns) && el.localName === localName;
}

export function findChildren(parent: Element, ns: Namespace, localName: string): Element[] {
  return childElements(parent).filter((el) => isNamed(el, ns, localName));
}

export function findChild(parent: Element, ns: Namespace, localName: string): Element | null {
  return childElements(parent).find((el) => isNamed(el, ns, localName)) ?? null;
}

export function findOrCreateChild(parent: Element, ns: Namespace, localName: string): Element {
  const existing = findChild(parent, ns, localName);
  if (existing) return existing;

  const created = createElement(parent.ownerDocument, ns, localName);
  parent.appendChild(created);
  return created;
}

/** Follow a chain of child names; null as soon as one is missing */
export function findPath(parent: Element, ns: Namespace, names: string[]): Element | null {
  let current: Element | null = parent;
  for (const name of names) {
    if (!current) return null;
    current = findChild(current, ns, name);
  }
  return current;
}

export function findOrCreatePath(parent: Element, ns: Namespace, names: string[]): Element {
  return names.reduce((current, name) => findOrCreateChild(current, ns, name), parent);
}

// ─── Text ────────────────────────────────────────────────────────

export function textOf(el: Element): string {
  let text = "";
  for (let i = 0; i < el.childNodes.length; i++) {
    const node = el.childNodes.item(i);
    if (node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE) {
      text += node.nodeValue ?? "";
    }
  }
  return text;
}

/** Replace all content of `el` with a single text node */
export function setText(el: Element, value: string): void {
  while (el.firstChild) {
    el.removeChild(el.firstChild);
  }
  if (value !== "") {
    el.appendChild(el.ownerDocument.createTextNode(value));
  }
}

export function childText(parent: Element, ns: Namespace, localName: string): string | undefined {
  const el = findChild(parent, ns, localName);
  return el ? textOf(el) : undefined;
}

export function setChildText(
  parent: Element,
  ns: Namespace,
  localName: string,
  value: string,
): Element {
  const el = findOrCreateChild(parent, ns, localName);
  setText(el, value);
  return el;
}

// ─── Passes & Components ─────────────────────────────────────────

export function findPass(doc: Document, pass: PassName): Element | null {
  const root = rootElement(doc);
  if (!root) return null;
  return (
    findChildren(root, "unattend", "settings").find(
      (settings) => settings.getAttribute("pass") === pass,
    ) ?? null
  );
}

export function findOrCreatePass(doc: Document, pass: PassName): Element {
  const existing = findPass(doc, pass);
  if (existing) return existing;

  const root = ensureRoot(doc);
  const settings = createElement(doc, "unattend", "settings");
  settings.setAttribute("pass", pass);
  root.appendChild(settings);
  return settings;
}

export function findComponent(
  doc: Document,
  pass: PassName,
  name: ComponentName,
): Element | null {
  const settings = findPass(doc, pass);
  if (!settings) return null;
  return (
    findChildren(settings, "unattend", "component").find(
      (component) => component.getAttribute("name") === name,
    ) ?? null
  );
}

/**
 * Find a component, creating its pass and the component (with the fixed
 * attribute set) when absent. Attributes of an existing component are left
 * as they are.
 */
export function findOrCreateComponent(
  doc: Document,
  pass: PassName,
  name: ComponentName,
): Element {
  const existing = findComponent(doc, pass, name);
  if (existing) return existing;

  const settings = findOrCreatePass(doc, pass);
  const component = createElement(doc, "unattend", "component");
  component.setAttribute("name", name);
  for (const [attr, value] of Object.entries(COMPONENT_ATTRIBUTES)) {
    component.setAttribute(attr, value);
  }
  settings.appendChild(component);
  return component;
}
