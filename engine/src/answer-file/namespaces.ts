/**
 * answerkit Engine — XML Namespaces
 *
 * The only place namespace URIs and their preferred prefixes are spelled
 * out. Everything else refers to them through the Namespace key.
 */

export const NAMESPACES = {
  unattend: { uri: "urn:schemas-microsoft-com:unattend", prefix: "" },
  wcm: { uri: "http://schemas.microsoft.com/WMIConfig/2002/State", prefix: "wcm" },
  eds: { uri: "urn:answerkit:eds", prefix: "eds" },
} as const;

export type Namespace = keyof typeof NAMESPACES;

/** Declaration order on the root element */
export const NAMESPACE_KEYS: readonly Namespace[] = ["unattend", "wcm", "eds"];

/** Reserved namespace for xmlns declarations */
export const XMLNS_URI = "http://www.w3.org/2000/xmlns/";

export function namespaceUri(ns: Namespace): string {
  return NAMESPACES[ns].uri;
}

/** Root element local name */
export const ROOT_ELEMENT = "unattend";

/** Root element of the extension subtree */
export const EXTENSION_ELEMENT = "EDS";
