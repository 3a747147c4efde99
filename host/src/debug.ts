export type DebugComponent = "http" | "conn" | "frame" | "relay";

export type DebugFlag = DebugComponent;

/**
 * Debug configuration
 *
 * - `true`: enable all debug components
 * - `false`: disable all debug components
 * - list: enable only the listed components
 */
export type DebugConfig = boolean | DebugFlag[];

export type DebugLogFn = (component: DebugComponent, message: string) => void;

export const DEBUG_ENV_VAR = "HOLMUX_DEBUG";

const ALL_DEBUG_FLAGS: readonly DebugFlag[] = ["http", "conn", "frame", "relay"];
const DEBUG_FLAG_NAMES: ReadonlySet<string> = new Set(ALL_DEBUG_FLAGS);

function isDebugFlag(value: string): value is DebugFlag {
  return DEBUG_FLAG_NAMES.has(value);
}

/**
 * Parse a comma separated debug list (`HOLMUX_DEBUG=conn,relay`).
 *
 * `1`, `true` and `all` enable every component. Unknown names are ignored.
 */
export function parseDebugList(raw: string | undefined): Set<DebugFlag> {
  const flags = new Set<DebugFlag>();
  if (!raw) return flags;

  for (const part of raw.split(",")) {
    const name = part.trim().toLowerCase();
    if (!name) continue;
    if (name === "1" || name === "true" || name === "all" || name === "*") {
      for (const flag of ALL_DEBUG_FLAGS) flags.add(flag);
      continue;
    }
    if (isDebugFlag(name)) flags.add(name);
  }

  return flags;
}

export function parseDebugEnv(
  env: NodeJS.ProcessEnv = process.env,
): Set<DebugFlag> {
  return parseDebugList(env[DEBUG_ENV_VAR]);
}

export function resolveDebugFlags(
  config: DebugConfig | undefined,
  envFlags: ReadonlySet<DebugFlag>,
): Set<DebugFlag> {
  if (config === false) return new Set();
  if (config === true) return new Set(ALL_DEBUG_FLAGS);

  const flags = new Set(envFlags);
  for (const flag of config ?? []) flags.add(flag);
  return flags;
}

export function debugFlagsToArray(flags: ReadonlySet<DebugFlag>): DebugFlag[] {
  return ALL_DEBUG_FLAGS.filter((flag) => flags.has(flag));
}

export function stripTrailingNewline(message: string): string {
  return message.endsWith("\n") ? message.slice(0, -1) : message;
}
