import { execFile } from "node:child_process";
import { promisify } from "node:util";

export const DISPATCH_SUB_COMMAND =
  "JUJU_DISPATCH_PATH=hooks/alertmanager_config_file_changed {charmDir}/dispatch";

/**
 * Runs a command and resolves when it exits
 * Allows dependency injection for testing
 */
export type CommandRunner = (command: string, args: string[]) => Promise<unknown>;

const defaultRunner: CommandRunner = async (command, args) => {
  const execFileAsync = promisify(execFile);
  return await execFileAsync(command, args);
};

/**
 * Arguments that make juju-exec/juju-run fire alertmanager_config_file_changed on a unit
 */
export function dispatchArgs(unit: string, charmDir: string): string[] {
  return ["-u", unit, DISPATCH_SUB_COMMAND.replace("{charmDir}", charmDir)];
}

/**
 * Fire alertmanager_config_file_changed on the unit
 */
export async function dispatch(
  runCmd: string,
  unit: string,
  charmDir: string,
  runner: CommandRunner = defaultRunner,
): Promise<void> {
  await runner(runCmd, dispatchArgs(unit, charmDir));
}
