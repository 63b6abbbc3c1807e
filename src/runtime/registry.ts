/**
 * Process-wide registry of frozen packages.
 *
 * Every generated unit module ends with a call to {@link registerPackage};
 * importing the module is enough to make its value available by path.
 */
const packagesByPath = new Map<string, unknown>();

/**
 * Registers a rebuilt package value under its unit path.
 *
 * @param path
 *   Unit path relative to the generation root (`""` for the root unit).
 * @param value
 *   The rebuilt value.
 * @throws
 *   If a package is already registered under `path`.
 */
export function registerPackage(path: string, value: unknown): void {
  if (packagesByPath.has(path)) {
    throw new Error(`[freeze] Package "${path}" is already registered.`);
  }
  packagesByPath.set(path, value);
}

/**
 * Looks up a registered package value.
 *
 * @returns The value, or `undefined` when nothing is registered under `path`.
 */
export function lookupPackage(path: string): unknown {
  return packagesByPath.get(path);
}

/** Paths of all registered packages, in registration order. */
export function registeredPackages(): string[] {
  return Array.from(packagesByPath.keys());
}

/** Forgets every registration. */
export function resetRegistry(): void {
  packagesByPath.clear();
}
