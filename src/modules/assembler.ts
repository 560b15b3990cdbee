/**
 * Assembler Module
 * Lays out extracted elements in the registry's element order and renders
 * the output document
 */

import { Builder } from "xml2js";
import {
  ALWAYS_EMITTED_ELEMENT,
  SITE_ELEMENT,
  getElementOrder,
} from "../utils/element-order";
import type { OutputDocument, OutputRecord } from "../types";

export const ROOT_ELEMENT = "LROIPROM";
export const COLLECTION_ELEMENT = "questionaires";
export const RECORD_ELEMENT = "questionaire";

const NULL_MARKERS = ["none", "null"];

/**
 * Build one record in schema order
 *
 * Elements without a value are left out, except GENDER, which the schema
 * requires to be present. HOSPITAL always carries the run's site id.
 */
export function assembleRecord(
  elements: ReadonlyMap<string, string>,
  rowType: string,
  hospital: number,
): OutputRecord {
  const values = new Map(elements);
  values.set(SITE_ELEMENT, String(hospital));

  const record: OutputRecord = { rowType, elements: [] };

  for (const name of getElementOrder(rowType) ?? []) {
    const value = values.get(name) ?? "";

    if (name === ALWAYS_EMITTED_ELEMENT) {
      const emitted = NULL_MARKERS.includes(value.toLowerCase()) ? "" : value;
      record.elements.push({ name, value: emitted });
    } else if (value !== "") {
      record.elements.push({ name, value });
    }
  }

  return record;
}

/**
 * Render the document as pretty-printed XML
 */
export function serializeDocument(document: OutputDocument): string {
  const builder = new Builder({
    rootName: ROOT_ELEMENT,
    xmldec: { version: "1.0", encoding: "UTF-8" },
    renderOpts: { pretty: true, indent: "  ", newline: "\n" },
  });

  const records = document.map((record) => {
    const element: Record<string, string> = {};
    for (const { name, value } of record.elements) {
      element[name] = value;
    }
    return element;
  });

  return builder.buildObject({ [COLLECTION_ELEMENT]: { [RECORD_ELEMENT]: records } });
}
