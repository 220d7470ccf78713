import type { Repository } from '../repository/repository.js';

export interface CompilationOptions {
  /** Profiles to enable (default: every profile in the repository) */
  profiles?: readonly string[];
  /** Extension directories to compile (default: every `extensions/*`) */
  extensions?: readonly string[];
  /** Profiles to disable, applied after `profiles` */
  ignoreProfiles?: readonly string[];
  /** Extension directories to skip, applied after `extensions` */
  ignoreExtensions?: readonly string[];
  /**
   * Prefix the keys of extension-introduced objects and events, and every
   * attribute type naming them, with the extension name (default: true)
   */
  prefixExtensions?: boolean;
  /**
   * Rewrite attributes typed by an object or event name to
   * `{type: "object", object_type, object_name}` (default: true)
   */
  setObjectTypes?: boolean;
  /** Set `observable` on attributes from the dictionary's registry (default: true) */
  setObservable?: boolean;
  /** List each event under its category's `classes` (default: true) */
  mapEventsToCategories?: boolean;
}

export interface ResolvedCompilationOptions {
  profiles: readonly string[];
  extensions: readonly string[];
  prefixExtensions: boolean;
  setObjectTypes: boolean;
  setObservable: boolean;
  mapEventsToCategories: boolean;
}

export const DEFAULT_COMPILATION_OPTIONS = {
  prefixExtensions: true,
  setObjectTypes: true,
  setObservable: true,
  mapEventsToCategories: true,
} as const satisfies CompilationOptions;

/** Turn enable/ignore lists into the concrete profile and extension sets. */
export function resolveCompilationOptions(
  repo: Repository,
  options: CompilationOptions = {}
): ResolvedCompilationOptions {
  const ignoredProfiles = new Set(options.ignoreProfiles ?? []);
  const ignoredExtensions = new Set(options.ignoreExtensions ?? []);
  const profiles = options.profiles ?? repo.profiles();
  const extensions = options.extensions ?? [...repo.extensions()];

  return {
    profiles: profiles.filter((name) => !ignoredProfiles.has(name)),
    extensions: extensions.filter((name) => !ignoredExtensions.has(name)),
    prefixExtensions:
      options.prefixExtensions ?? DEFAULT_COMPILATION_OPTIONS.prefixExtensions,
    setObjectTypes:
      options.setObjectTypes ?? DEFAULT_COMPILATION_OPTIONS.setObjectTypes,
    setObservable:
      options.setObservable ?? DEFAULT_COMPILATION_OPTIONS.setObservable,
    mapEventsToCategories:
      options.mapEventsToCategories ??
      DEFAULT_COMPILATION_OPTIONS.mapEventsToCategories,
  };
}
