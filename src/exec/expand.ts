import { homedir } from "node:os";

const VARIABLE = /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g;

/**
 * Expand a leading `~` and `$VAR` / `${VAR}` references.
 *
 * Variables are looked up in `env` first, then in `fallback`. Unknown
 * variables are left untouched for the shell to deal with.
 */
export function expandCommand(
  command: string,
  env: Readonly<Record<string, string>>,
  fallback: NodeJS.ProcessEnv = process.env,
  home: string = homedir(),
): string {
  let expanded = command;
  if (expanded === "~" || expanded.startsWith("~/")) {
    expanded = home + expanded.slice(1);
  }
  return expanded.replace(VARIABLE, (match: string, braced: string | undefined, bare: string | undefined) => {
    const name = braced ?? bare;
    if (name === undefined) return match;
    const value = env[name] ?? fallback[name];
    return value ?? match;
  });
}
