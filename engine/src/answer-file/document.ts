/**
 * answerkit Engine — Answer Document Loading
 *
 * Creates, parses and opens answer files. openAnswerFile() returns the
 * handle every mutation takes; there is no process-wide "current file".
 */

import * as fs from "fs";
import { DOMImplementation, DOMParser } from "@xmldom/xmldom";
import type { AnswerFile, OpenAnswerFileOptions } from "../types";
import { createLogger } from "../utils/logger";
import { ensureRoot } from "./accessor";
import { AnswerFileError, errorMessage } from "./errors";
import { ROOT_ELEMENT, namespaceUri } from "./namespaces";
import { DEFAULT_NEWLINE } from "./writer";

/** A new document: `<unattend>` with all namespaces declared */
export function createAnswerDocument(): Document {
  const doc = new DOMImplementation().createDocument(
    namespaceUri("unattend"),
    ROOT_ELEMENT,
    null,
  );
  ensureRoot(doc);
  return doc;
}

/**
 * Parse answer-file text. Blank input yields a new document; text that is
 * not well-formed throws PARSE_ERROR.
 */
export function parseAnswerDocument(xml: string, source = "<string>"): Document {
  const text = xml.replace(/^\uFEFF/, "");
  if (text.trim() === "") return createAnswerDocument();

  const problems: string[] = [];
  const parser = new DOMParser({
    errorHandler: (level: string, msg: unknown) => {
      if (level === "error" || level === "fatalError") problems.push(String(msg));
    },
  });

  let doc: Document | undefined;
  try {
    doc = parser.parseFromString(text, "text/xml");
  } catch (err: unknown) {
    problems.push(errorMessage(err));
  }

  if (!doc || problems.length > 0) {
    throw new AnswerFileError(
      "PARSE_ERROR",
      `Could not parse ${source}: ${problems.join("; ")}`,
      { source },
    );
  }

  ensureRoot(doc);
  return doc;
}

export function loadAnswerDocument(filePath: string): Document {
  let xml: string;
  try {
    xml = fs.readFileSync(filePath, "utf-8");
  } catch (err: unknown) {
    throw new AnswerFileError(
      "SOURCE_UNREADABLE",
      `Could not read answer file ${filePath}: ${errorMessage(err)}`,
      { path: filePath },
    );
  }
  return parseAnswerDocument(xml, filePath);
}

/**
 * Open an answer file for editing. The source is loaded when it exists,
 * otherwise a new document is created; every mutation on the returned
 * handle persists to `outputPath`.
 */
export function openAnswerFile(options: OpenAnswerFileOptions): AnswerFile {
  const logger = options.logger ?? createLogger();
  const newline = options.newline ?? DEFAULT_NEWLINE;

  if (options.sourcePath && fs.existsSync(options.sourcePath)) {
    const document = loadAnswerDocument(options.sourcePath);
    logger.debug(
      { source: options.sourcePath, output: options.outputPath },
      "Loaded answer file",
    );
    return {
      document,
      outputPath: options.outputPath,
      sourcePath: options.sourcePath,
      logger,
      newline,
    };
  }

  logger.debug(
    { source: options.sourcePath, output: options.outputPath },
    "No source answer file; created a new document",
  );
  return {
    document: createAnswerDocument(),
    outputPath: options.outputPath,
    logger,
    newline,
  };
}
