/**
 * answerkit Engine — Identity Mutators
 *
 * Device name (specialize) and local administrator accounts (oobeSystem).
 *
 * Account passwords use setup's "not plaintext" form: base64 of the
 * UTF-16LE text with "Password" appended, and PlainText=false. That is an
 * encoding, not encryption.
 */

import type { AnswerFile, LocalAccountInfo, MutationResult } from "../types";
import {
  SHELL_SETUP,
  childText,
  createElement,
  findChild,
  findChildren,
  findComponent,
  findOrCreateChild,
  findOrCreateComponent,
  findOrCreatePath,
  findPath,
  markAdded,
  setChildText,
} from "./accessor";
import { AnswerFileError } from "./errors";
import { commit } from "./mutation";
import {
  DeviceNameSchema,
  EncodedPasswordSchema,
  UsernameSchema,
  validate,
} from "./validation";

export const ADMINISTRATORS_GROUP = "Administrators";

/** Suffix setup appends before encoding LocalAccount passwords */
const PASSWORD_SUFFIX = "Password";

const ACCOUNT_LIST_PATH = ["UserAccounts", "LocalAccounts"];

export function encodeAccountPassword(plain: string): string {
  return Buffer.from(`${plain}${PASSWORD_SUFFIX}`, "utf16le").toString("base64");
}

// ─── Device Name ─────────────────────────────────────────────────

/**
 * Set ComputerName on the specialize Shell-Setup component. The component
 * must already exist; this does not create passes.
 */
export function setDeviceName(file: AnswerFile, name: string): MutationResult {
  return commit(file, "setDeviceName", () => {
    const component = findComponent(file.document, "specialize", SHELL_SETUP);
    if (!component) {
      throw new AnswerFileError(
        "STRUCTURAL_NOT_FOUND",
        `The specialize pass has no ${SHELL_SETUP} component`,
        { pass: "specialize", component: SHELL_SETUP },
      );
    }
    const value = validate(DeviceNameSchema, name, "device name");
    setChildText(component, "unattend", "ComputerName", value);
  });
}

export function getDeviceName(file: AnswerFile): string | undefined {
  const component = findComponent(file.document, "specialize", SHELL_SETUP);
  return component ? childText(component, "unattend", "ComputerName") : undefined;
}

// ─── Local Accounts ──────────────────────────────────────────────

function findAccountList(doc: Document): Element | null {
  const component = findComponent(doc, "oobeSystem", SHELL_SETUP);
  return component ? findPath(component, "unattend", ACCOUNT_LIST_PATH) : null;
}

function writePassword(account: Element, encodedPassword: string): void {
  const password = findOrCreateChild(account, "unattend", "Password");
  setChildText(password, "unattend", "Value", encodedPassword);
  setChildText(password, "unattend", "PlainText", "false");
}

/**
 * Create or update a local administrator by username. An existing account
 * only gets its password replaced; DisplayName and Group stay as they are.
 */
export function setLocalAccount(
  file: AnswerFile,
  username: string,
  encodedPassword: string,
): MutationResult<"created" | "updated"> {
  return commit(file, "setLocalAccount", () => {
    const name = validate(UsernameSchema, username, "username");
    const password = validate(EncodedPasswordSchema, encodedPassword, "encoded password");

    const doc = file.document;
    const component = findOrCreateComponent(doc, "oobeSystem", SHELL_SETUP);
    const accounts = findOrCreatePath(component, "unattend", ACCOUNT_LIST_PATH);

    const existing = findChildren(accounts, "unattend", "LocalAccount").find(
      (account) => childText(account, "unattend", "Name") === name,
    );
    if (existing) {
      writePassword(existing, password);
      file.logger.debug({ username: name }, "Updated local account password");
      return "updated";
    }

    const account = createElement(doc, "unattend", "LocalAccount");
    markAdded(account);
    accounts.appendChild(account);
    writePassword(account, password);
    setChildText(account, "unattend", "DisplayName", name);
    setChildText(account, "unattend", "Group", ADMINISTRATORS_GROUP);
    setChildText(account, "unattend", "Name", name);
    file.logger.debug({ username: name }, "Created local account");
    return "created";
  });
}

export function listLocalAccounts(file: AnswerFile): LocalAccountInfo[] {
  const accounts = findAccountList(file.document);
  if (!accounts) return [];

  return findChildren(accounts, "unattend", "LocalAccount").map((account) => {
    const password = findChild(account, "unattend", "Password");
    const plainText = password ? childText(password, "unattend", "PlainText") : undefined;
    return {
      name: childText(account, "unattend", "Name") ?? "",
      displayName: childText(account, "unattend", "DisplayName"),
      group: childText(account, "unattend", "Group"),
      plainText: plainText?.trim().toLowerCase() === "true",
    };
  });
}
