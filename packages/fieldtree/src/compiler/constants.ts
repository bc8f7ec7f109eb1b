export const TYPENAME_FIELD = "__typename";

export const DEFER_DIRECTIVE = "defer";

export const INCLUDE_DIRECTIVE = "include";

export const SKIP_DIRECTIVE = "skip";

