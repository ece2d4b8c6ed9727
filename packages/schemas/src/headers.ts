export type InboundHeaders = Record<string, string | string[] | undefined>;

/**
 * Case-insensitive lookup of a single header value. Repeated headers yield their first value.
 */
export const readHeader = (headers: InboundHeaders, name: string): string | undefined => {
  const wanted = name.toLowerCase();

  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted || value === undefined) {
      continue;
    }

    return Array.isArray(value) ? value[0] : value;
  }

  return undefined;
};
