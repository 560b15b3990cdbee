/**
 * Registry element order per row type
 *
 * The order is fixed by the registry's XML schema and must not change.
 */

import elementOrder from "../config/element-order.json";

export const ELEMENT_ORDER: Readonly<Record<string, readonly string[]>> = elementOrder;

// Elements a record cannot be submitted without
export const PERSON_ELEMENT = "UPNNUM";
export const ENTRY_DATE_ELEMENT = "DATUMINVUL";
export const REQUIRED_ELEMENTS = [PERSON_ELEMENT, ENTRY_DATE_ELEMENT] as const;

// Injected from the run's site id
export const SITE_ELEMENT = "HOSPITAL";

// Emitted even when empty
export const ALWAYS_EMITTED_ELEMENT = "GENDER";

export function getElementOrder(rowType: string): readonly string[] | undefined {
  return Object.hasOwn(ELEMENT_ORDER, rowType) ? ELEMENT_ORDER[rowType] : undefined;
}
