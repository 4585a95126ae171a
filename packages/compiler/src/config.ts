export interface CompilerOptions {
  /** Replaces the extension of the root path and of every import target. */
  fileExtension: string;
}

export const DEFAULT_FILE_EXTENSION = ".brk";

export const DEFAULT_COMPILER_OPTIONS: Readonly<CompilerOptions> = {
  fileExtension: DEFAULT_FILE_EXTENSION,
};

export const resolveCompilerOptions = (
  overrides: Partial<CompilerOptions> = {}
): CompilerOptions => {
  const fileExtension =
    overrides.fileExtension ?? DEFAULT_COMPILER_OPTIONS.fileExtension;

  if (!/^\.[^./\\]+$/.test(fileExtension)) {
    throw new Error(
      `fileExtension must be a dot followed by at least one character, got "${fileExtension}"`
    );
  }

  return { fileExtension };
};
