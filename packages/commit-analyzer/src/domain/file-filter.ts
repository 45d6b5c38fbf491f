export const normalizeExtension = (extension: string): string => {
  const trimmed = extension.trim().toLowerCase();
  if (trimmed.length === 0) {
    return "";
  }

  return trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
};

export const normalizeExcludedExtensions = (extensions: readonly string[]): readonly string[] => [
  ...new Set(extensions.map(normalizeExtension).filter((extension) => extension.length > 0)),
];

// Leading dots belong to the name: ".gitignore" has no extension.
export const fileExtension = (filePath: string): string => {
  const name = filePath.slice(filePath.lastIndexOf("/") + 1).replace(/^\.+/, "");
  const dotIndex = name.lastIndexOf(".");
  return dotIndex === -1 ? "" : name.slice(dotIndex).toLowerCase();
};

/**
 * Builds a path predicate from an exclusion list, normalizing the list once.
 * The predicate is true for paths whose extension is not excluded.
 */
export const createExtensionFilter = (
  excludedExtensions: readonly string[] = [],
): ((filePath: string) => boolean) => {
  const excluded = new Set(normalizeExcludedExtensions(excludedExtensions));
  if (excluded.size === 0) {
    return () => true;
  }

  return (filePath) => !excluded.has(fileExtension(filePath));
};

export const shouldIncludeFile = (
  filePath: string,
  excludedExtensions?: readonly string[],
): boolean => createExtensionFilter(excludedExtensions)(filePath);
