/**
 * Taskline Icon System
 *
 * Status markers for task output with auto-detection of terminal capabilities.
 * - Unicode symbols for most modern terminals
 * - ASCII as fallback for legacy terminals
 *
 * @module theme/icons
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Status markers used when rendering tasks.
 */
export type IconSet = {
  /** Marker for a completed task */
  done: string;
  /** Marker for an open task */
  pending: string;
};

/**
 * Icon support level.
 */
export type IconSupport = "unicode" | "ascii";

/**
 * Icon preference as written in configuration.
 * `auto` defers to terminal detection.
 */
export type IconPreference = IconSupport | "auto";

// =============================================================================
// Icon Sets
// =============================================================================

export const unicodeIcons: IconSet = {
  done: "✓",
  pending: "☐",
};

export const asciiIcons: IconSet = {
  done: "[x]",
  pending: "[ ]",
};

// =============================================================================
// Detection
// =============================================================================

/**
 * Detect the best icon support level for an environment.
 */
export function detectIconSupport(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): IconSupport {
  if (env.TASKLINE_ICONS === "ascii") return "ascii";
  if (env.TASKLINE_ICONS === "unicode") return "unicode";

  // Windows Terminal supports Unicode
  if (env.WT_SESSION) return "unicode";

  const isLegacyWindows = platform === "win32" && !env.TERM_PROGRAM;
  return isLegacyWindows ? "ascii" : "unicode";
}

/**
 * Resolve an icon preference to a concrete icon set.
 *
 * @example
 * ```typescript
 * getIconSet("ascii").done; // "[x]"
 * getIconSet("auto"); // detected from the environment
 * ```
 */
export function getIconSet(preference: IconPreference = "auto"): IconSet {
  const support = preference === "auto" ? detectIconSupport() : preference;
  return support === "ascii" ? asciiIcons : unicodeIcons;
}
