/**
 * answerkit Engine — Extension Data Store
 *
 * The eds:EDS subtree carries what setup itself ignores: the verbatim copy
 * script run by the specialize bootstrap, and free-form user input.
 *
 *   <eds:EDS>
 *     <eds:CopyScript>…</eds:CopyScript>
 *     <eds:UserInput>
 *       <eds:site>Lab 3</eds:site>
 *     </eds:UserInput>
 *   </eds:EDS>
 */

import type { AnswerFile, MutationResult, UserInputFields } from "../types";
import {
  childElements,
  ensureRoot,
  findChild,
  findChildren,
  findOrCreateChild,
  rootElement,
  setChildText,
  textOf,
} from "./accessor";
import { commit } from "./mutation";
import { EXTENSION_ELEMENT, namespaceUri } from "./namespaces";
import { UserInputSchema, validate } from "./validation";

/** User input keys that are never written to disk */
export const USER_INPUT_DENYLIST: readonly string[] = ["localPassword"];

function findExtension(doc: Document): Element | null {
  const root = rootElement(doc);
  return root ? findChild(root, "eds", EXTENSION_ELEMENT) : null;
}

function findOrCreateExtension(doc: Document): Element {
  return findOrCreateChild(ensureRoot(doc), "eds", EXTENSION_ELEMENT);
}

// ─── Copy Script ─────────────────────────────────────────────────

/** Store the script text without persisting; used by the bootstrap injector */
export function writeCopyScript(doc: Document, script: string): void {
  setChildText(findOrCreateExtension(doc), "eds", "CopyScript", script);
}

export function setCopyScript(file: AnswerFile, script: string): MutationResult {
  return commit(file, "setCopyScript", () => writeCopyScript(file.document, script));
}

export function getCopyScript(file: AnswerFile): string | undefined {
  const extension = findExtension(file.document);
  const script = extension ? findChild(extension, "eds", "CopyScript") : null;
  return script ? textOf(script) : undefined;
}

// ─── User Input ──────────────────────────────────────────────────

/** Drop denylisted keys */
export function redactUserInput(fields: UserInputFields): UserInputFields {
  return Object.fromEntries(
    Object.entries(fields).filter(([key]) => !USER_INPUT_DENYLIST.includes(key)),
  );
}

/**
 * Upsert each field as eds:UserInput/eds:<key>. Denylisted keys are dropped
 * from the input and removed from the document if already present.
 * Returns the keys that were written.
 */
export function setUserInput(
  file: AnswerFile,
  fields: UserInputFields,
): MutationResult<string[]> {
  return commit(file, "setUserInput", () => {
    const redacted = redactUserInput(fields);
    const dropped = Object.keys(fields).length - Object.keys(redacted).length;
    if (dropped > 0) {
      file.logger.debug({ dropped }, "Dropped denylisted user input fields");
    }

    const accepted = validate(UserInputSchema, redacted, "user input");
    const userInput = findOrCreateChild(
      findOrCreateExtension(file.document),
      "eds",
      "UserInput",
    );

    for (const key of USER_INPUT_DENYLIST) {
      for (const stale of findChildren(userInput, "eds", key)) {
        userInput.removeChild(stale);
      }
    }
    for (const [key, value] of Object.entries(accepted)) {
      setChildText(userInput, "eds", key, value);
    }
    return Object.keys(accepted);
  });
}

export function getUserInput(file: AnswerFile): UserInputFields {
  const extension = findExtension(file.document);
  const userInput = extension ? findChild(extension, "eds", "UserInput") : null;
  if (!userInput) return {};

  const fields: UserInputFields = {};
  for (const el of childElements(userInput)) {
    if (el.namespaceURI !== namespaceUri("eds")) continue;
    if (USER_INPUT_DENYLIST.includes(el.localName)) continue;
    fields[el.localName] = textOf(el);
  }
  return fields;
}
