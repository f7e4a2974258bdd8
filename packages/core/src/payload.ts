/**
 * Construction of creation requests from bibliographic items.
 */

import { normalizeDate } from "./dates.js";
import type { BibliographicItem, PropertyMap, PropertyValue } from "./types.js";

export const DOI_RESOLVER = "https://doi.org/";

/**
 * Field type assumed for DOI when the remote table does not declare one.
 */
export const DEFAULT_DOI_TYPE = "rich_text";

/**
 * Fixed field names written on every record.
 */
export const FIELDS = {
  title: "Title",
  authors: "Authors",
  date: "Date",
  doi: "DOI",
} as const;

function richText(content: string): PropertyValue {
  return { rich_text: [{ text: { content } }] };
}

/**
 * Turn a bare DOI into a resolver link; values starting with "http" pass through.
 */
export function toDoiUrl(doi: string): string {
  return doi.startsWith("http") ? doi : `${DOI_RESOLVER}${doi}`;
}

/**
 * Encode a DOI link for a field of the given type.
 */
export function encodeDoi(doiUrl: string, doiType: string): PropertyValue {
  return doiType === "url" ? { url: doiUrl } : richText(doiUrl);
}

/**
 * Build the property map of a new record.
 * Date and DOI are only written when there is a value for them.
 */
export function buildProperties(
  item: BibliographicItem,
  doiType: string = DEFAULT_DOI_TYPE
): PropertyMap {
  const authors = item.authors.length > 0 ? item.authors.join(", ") : "Unknown";

  const properties: PropertyMap = {
    [FIELDS.title]: { title: [{ text: { content: item.title } }] },
    [FIELDS.authors]: richText(authors),
  };

  const date = normalizeDate(item.date);
  if (date) {
    properties[FIELDS.date] = { date: { start: date } };
  }

  const doi = item.doi.trim();
  if (doi) {
    properties[FIELDS.doi] = encodeDoi(toDoiUrl(doi), doiType);
  }

  return properties;
}
