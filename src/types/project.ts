/** One entry of the declared project tree. Paths are relative to the project root. */
export type ProjectStructureNode =
  | { readonly kind: "directory"; readonly path: string }
  | { readonly kind: "file"; readonly path: string; readonly content: string };

export interface EnvironmentVariableSet {
  /** Written to the project-local env file; existing keys are never rewritten. */
  readonly projectScoped: Readonly<Record<string, string>>;
  /** Raw lines appended to the user's shell profile, deduplicated by exact line. */
  readonly shellScoped: readonly string[];
}

export interface RuntimeEnvironmentDescriptor {
  readonly name: string;
  readonly packages: readonly string[];
}

/** Paths (relative to the project root) of the runtime's own tools, when present. */
export interface RuntimeTools {
  readonly python?: string;
  readonly pip?: string;
}
