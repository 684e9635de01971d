// "$id", "$ref", "$values" and their already-escaped forms ("$$id", ...)
const METADATA_LIKE_KEY = /^\$+(?:id|ref|values)$/;

/**
 * Escapes a user key that would read back as reference metadata by
 * prefixing one more `$`.
 */
export const escapeMetadataKey = (key: string): string => {
  if (METADATA_LIKE_KEY.test(key)) {
    return `$${key}`;
  }
  return key;
};

export const unescapeMetadataKey = (key: string): string => {
  if (key.startsWith("$$") && METADATA_LIKE_KEY.test(key)) {
    return key.slice(1);
  }
  return key;
};
