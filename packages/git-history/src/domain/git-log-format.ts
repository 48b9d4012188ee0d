export const COMMIT_RECORD_SEPARATOR = "\u001e";
export const COMMIT_FIELD_SEPARATOR = "\u001f";

export const COMMIT_HEADER_FORMAT = "%x1e%H%x1f%aI";
