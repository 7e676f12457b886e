import { describe, expect, test, vi } from "vitest";
import type { SpawnedProcess, Spawner } from "./config-dir-watcher";
import { createConfigDirWatcher, JUJU_EXEC, JUJU_RUN, jujuExecBinary } from "./config-dir-watcher";

const CHARM_DIR = "/var/lib/juju/agents/unit-alertmanager-configurer-k8s-0/charm";

const setup = ({ hasJujuExec = true }: { hasJujuExec?: boolean } = {}) => {
  const child: SpawnedProcess = { pid: 4242, unref: vi.fn() };
  const spawn = vi.fn<Spawner>(() => child);
  const openLog = vi.fn(() => 17);
  const closeLog = vi.fn();
  const watcher = createConfigDirWatcher({
    configDir: "/etc/alertmanager/",
    unitName: "alertmanager-configurer-k8s/0",
    charmDir: CHARM_DIR,
    nodeBinary: "/usr/bin/node",
    logFile: "/var/log/watchdog.log",
    env: { PATH: "/usr/bin", JUJU_CONTEXT_ID: "alertmanager-configurer-k8s/0-start-123" },
    deps: {
      spawn,
      exists: (path) => hasJujuExec && path === JUJU_EXEC,
      openLog,
      closeLog,
    },
  });
  return { child, spawn, openLog, closeLog, watcher };
};

describe("jujuExecBinary", () => {
  test("prefers juju-exec", () => {
    expect(jujuExecBinary(() => true)).toBe("/usr/bin/juju-exec");
  });

  test("falls back to juju-run on older agents", () => {
    expect(jujuExecBinary(() => false)).toBe("/usr/bin/juju-run");
  });
});

describe("createConfigDirWatcher", () => {
  test("spawns the watcher script detached", () => {
    const { spawn, watcher } = setup();

    const pid = watcher.startWatchdog();

    expect(pid).toBe(4242);
    expect(spawn).toHaveBeenCalledWith(
      "/usr/bin/node",
      [
        `${CHARM_DIR}/dist/watcher/cli.js`,
        "/etc/alertmanager/",
        JUJU_EXEC,
        "alertmanager-configurer-k8s/0",
        CHARM_DIR,
      ],
      {
        detached: true,
        stdio: ["ignore", 17, 17],
        env: { PATH: "/usr/bin" },
      },
    );
  });

  test("uses juju-run when juju-exec is missing", () => {
    const { spawn, watcher } = setup({ hasJujuExec: false });

    watcher.startWatchdog();

    expect(spawn.mock.calls[0]?.[1][2]).toBe(JUJU_RUN);
  });

  test("appends to the log file and releases it", () => {
    const { openLog, closeLog, child, watcher } = setup();

    watcher.startWatchdog();

    expect(openLog).toHaveBeenCalledWith("/var/log/watchdog.log");
    expect(closeLog).toHaveBeenCalledWith(17);
    expect(child.unref).toHaveBeenCalledTimes(1);
  });

  test("releases the log file when spawning fails", () => {
    const { spawn, closeLog, watcher } = setup();
    spawn.mockImplementation(() => {
      throw new Error("spawn EACCES");
    });

    expect(() => watcher.startWatchdog()).toThrow("spawn EACCES");
    expect(closeLog).toHaveBeenCalledWith(17);
  });
});
