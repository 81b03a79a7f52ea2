/**
 * answerkit Engine — Ordered Command Lists
 *
 * RunSynchronous and FirstLogonCommands hold items with a 1-based Order.
 * nextOrder() is the only place an Order is computed: one call per
 * insertion, immediately before the item is built.
 */

import type { OrderedCommand, OrderedCommandInput } from "../types";
import {
  childElements,
  childText,
  createElement,
  findChild,
  findChildren,
  markAdded,
  setChildText,
  textOf,
} from "./accessor";

const INTEGER = /^\s*[+-]?\d+\s*$/;

/** Parse an Order value; null for anything that is not an integer */
export function parseOrder(text: string | undefined): number | null {
  if (text === undefined || !INTEGER.test(text)) return null;
  const value = Number.parseInt(text, 10);
  return Number.isSafeInteger(value) ? value : null;
}

/**
 * Next Order for `listNode`: the largest parseable Order among its direct
 * items plus one. Missing or malformed values count as 0.
 */
export function nextOrder(listNode: Element): number {
  let max = 0;
  for (const item of childElements(listNode)) {
    const order = findChild(item, "unattend", "Order");
    if (!order) continue;
    const value = parseOrder(textOf(order));
    if (value !== null && value > max) max = value;
  }
  return max + 1;
}

/** Append one command to `listNode` and return the Order it was given */
export function appendOrderedCommand(listNode: Element, input: OrderedCommandInput): number {
  const order = nextOrder(listNode);

  const item = createElement(listNode.ownerDocument, "unattend", input.itemName);
  markAdded(item);
  listNode.appendChild(item);

  setChildText(item, "unattend", "Order", String(order));
  setChildText(item, "unattend", input.field, input.command);
  if (input.description !== undefined) {
    setChildText(item, "unattend", "Description", input.description);
  }
  return order;
}

export function listOrderedCommands(
  listNode: Element,
  itemName: string,
  field: OrderedCommandInput["field"],
): OrderedCommand[] {
  return findChildren(listNode, "unattend", itemName).map((item) => ({
    order: parseOrder(childText(item, "unattend", "Order")),
    command: childText(item, "unattend", field) ?? "",
    description: childText(item, "unattend", "Description"),
  }));
}
