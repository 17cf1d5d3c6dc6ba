// Never descend into these while expanding input directories.
export const DEFAULT_IGNORE_PATTERNS = [
  "node_modules",
  ".git",
  ".svn",
  ".hg",
  ".docmd",
  "dist",
  "~$*",
  "*.converted.md",
  ".DS_Store",
  "Thumbs.db",
];
