/**
 * Package Manager Port
 *
 * The boundary between set reconciliation and the OS package manager.
 * Workflows receive an implementation through the ExecutionContext and
 * gate every file or marker mutation on the boolean these calls return.
 */

export interface PackageManagerPort {
  /** Backend identifier used in messages (e.g. "pacman") */
  readonly name: string;

  /**
   * Packages the system considers user-requested rather than pulled in
   * as a dependency.
   *
   * @throws PackageManagerError when the query itself fails
   */
  explicitlyInstalled(): Promise<Set<string>>;

  /**
   * Install whatever is missing (never upgrading what is present) and mark
   * every given package explicit. An empty collection succeeds without
   * running anything.
   */
  install(pkgs: Iterable<string>): Promise<boolean>;

  /**
   * Mark the given packages as dependencies. Nothing is removed from the
   * system. An empty collection succeeds without running anything.
   */
  uninstall(pkgs: Iterable<string>): Promise<boolean>;
}
