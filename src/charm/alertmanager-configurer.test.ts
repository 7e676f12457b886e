import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  TEST_CONFIG_WITH_TEMPLATES,
  TEST_INVALID_CONFIG,
  TEST_TEMPLATE,
  TEST_VALID_CONFIG,
} from "../test-utils/fixtures/alertmanager-configs";
import { createHarness, TEST_APP_NAME } from "../test-utils/harness";

const CONFIGURER = "alertmanager-configurer";
const DUMMY = "dummy-http-server";

describe("Alertmanager Configurer charm", () => {
  describe("start", () => {
    test("pushes the default config and starts watching the config directory", async () => {
      const harness = createHarness();

      await harness.emit("start");

      expect(harness.pebble(CONFIGURER).files.get("/etc/alertmanager/alertmanager.yml")).toBe(
        harness.settings.defaultConfig,
      );
      expect(harness.startWatchdog).toHaveBeenCalledTimes(1);
      expect(harness.startWatchdog).toHaveBeenCalledWith("/etc/alertmanager/");
    });

    test("watches the configured directory and writes the config inside it", async () => {
      const harness = createHarness({ settings: { configDir: "/test/rules/dir" } });

      await harness.emit("start");

      expect(harness.startWatchdog).toHaveBeenCalledWith("/test/rules/dir");
      expect([...harness.pebble(CONFIGURER).files.keys()]).toEqual([
        "/test/rules/dir/alertmanager.yml",
      ]);
    });

    test("waits and defers when the workload container is unreachable", async () => {
      const harness = createHarness();
      harness.setCanConnect(CONFIGURER, false);

      await harness.emit("start");

      expect(harness.status()).toEqual({
        name: "waiting",
        message: "Waiting to be able to connect to alertmanager-configurer",
      });
      expect(harness.pebble(CONFIGURER).files.size).toBe(0);
      expect(harness.startWatchdog).not.toHaveBeenCalled();
      expect(harness.deferred()).toEqual([{ event: { name: "start" }, observer: "on-start" }]);
    });

    test("runs the deferred start once the container becomes reachable", async () => {
      const harness = createHarness();
      harness.setCanConnect(CONFIGURER, false);
      await harness.emit("start");

      harness.setCanConnect(CONFIGURER, true);
      await harness.emit("update-status");

      expect(harness.pebble(CONFIGURER).files.get("/etc/alertmanager/alertmanager.yml")).toBe(
        harness.settings.defaultConfig,
      );
      expect(harness.startWatchdog).toHaveBeenCalledTimes(1);
      expect(harness.deferred()).toEqual([]);
    });
  });

  describe("alertmanager-configurer pebble ready", () => {
    test("blocks without an alertmanager relation", async () => {
      const harness = createHarness();

      await harness.containerPebbleReady(CONFIGURER);

      expect(harness.status()).toEqual({
        name: "blocked",
        message: "Waiting for alertmanager relation to be created",
      });
      expect(harness.deferred()).toEqual([
        {
          event: { name: "alertmanager-configurer-pebble-ready", workloadName: CONFIGURER },
          observer: "start-alertmanager-configurer",
        },
      ]);
    });

    test("waits when the workload container is unreachable", async () => {
      const harness = createHarness();
      await harness.addRelation("alertmanager", "alertmanager-k8s");
      harness.setCanConnect(CONFIGURER, false);

      await harness.dispatch({
        name: "alertmanager-configurer-pebble-ready",
        workloadName: CONFIGURER,
      });

      expect(harness.status()).toEqual({
        name: "waiting",
        message: "Waiting for alertmanager-configurer container to be ready",
      });
    });

    test("waits for the dummy HTTP server", async () => {
      const harness = createHarness();
      await harness.addRelation("alertmanager", "alertmanager-k8s");

      await harness.containerPebbleReady(CONFIGURER);

      expect(harness.status()).toEqual({
        name: "waiting",
        message: "Waiting for the dummy HTTP server to be ready",
      });
      expect(harness.pebble(CONFIGURER).layers).toEqual([]);
    });

    test("adds the alertmanager-configurer layer and goes active", async () => {
      const harness = createHarness({
        settings: {
          configFile: "/test/rules/dir/config_file.yml",
          configurerPort: 1234,
          dummyHttpServerHost: "testhost",
          dummyHttpServerPort: 4321,
        },
      });
      await harness.addRelation("alertmanager", "alertmanager-k8s");
      await harness.containerPebbleReady(DUMMY);

      await harness.containerPebbleReady(CONFIGURER);

      expect(harness.plan(CONFIGURER)).toEqual({
        services: {
          "alertmanager-configurer": {
            override: "replace",
            startup: "enabled",
            command:
              "alertmanager_configurer -port=1234 " +
              "-alertmanager-conf=/test/rules/dir/config_file.yml " +
              "-alertmanagerURL=testhost:4321 " +
              "-multitenant-label=some_test_label " +
              "-delete-route-with-receiver=true ",
          },
        },
      });
      expect(harness.pebble(CONFIGURER).restarts).toEqual([["alertmanager-configurer"]]);
      expect(harness.hookTools.statusHistory.slice(-2)).toEqual([
        { name: "maintenance", message: "Configuring pebble layer for alertmanager-configurer" },
        { name: "active", message: "" },
      ]);
    });

    test("does not restart the service when the plan is unchanged", async () => {
      const harness = createHarness();
      await harness.addRelation("alertmanager", "alertmanager-k8s");
      await harness.containerPebbleReady(DUMMY);
      await harness.containerPebbleReady(CONFIGURER);

      await harness.containerPebbleReady(CONFIGURER);

      expect(harness.pebble(CONFIGURER).restarts).toHaveLength(1);
      expect(harness.status()).toEqual({ name: "active", message: "" });
    });
  });

  describe("dummy-http-server pebble ready", () => {
    test("adds the dummy HTTP server layer", async () => {
      const harness = createHarness();

      await harness.containerPebbleReady(DUMMY);

      expect(harness.plan(DUMMY)).toEqual({
        services: {
          "dummy-http-server": {
            override: "replace",
            startup: "enabled",
            command: "nginx",
          },
        },
      });
      expect(harness.pebble(DUMMY).restarts).toEqual([["dummy-http-server"]]);
      expect(harness.status()).toEqual({
        name: "maintenance",
        message: "Configuring pebble layer for dummy-http-server",
      });
    });

    test("waits and defers when the container is unreachable", async () => {
      const harness = createHarness();
      harness.setCanConnect(DUMMY, false);

      await harness.dispatch({ name: "dummy-http-server-pebble-ready", workloadName: DUMMY });

      expect(harness.status()).toEqual({
        name: "waiting",
        message: "Waiting for dummy-http-server container to be ready",
      });
      expect(harness.deferred()).toEqual([
        {
          event: { name: "dummy-http-server-pebble-ready", workloadName: DUMMY },
          observer: "on-dummy-http-server-pebble-ready",
        },
      ]);
    });
  });

  describe("deferred events", () => {
    test("a deferred pebble ready completes once its conditions hold", async () => {
      const harness = createHarness();
      await harness.containerPebbleReady(CONFIGURER);
      expect(harness.status().name).toBe("blocked");

      // Re-emitted before relation-created: the dummy server is still missing
      await harness.addRelation("alertmanager", "alertmanager-k8s");
      expect(harness.status()).toEqual({
        name: "waiting",
        message: "Waiting for the dummy HTTP server to be ready",
      });

      // Re-emitted before the dummy server starts, so it is deferred once more
      await harness.containerPebbleReady(DUMMY);
      expect(harness.status()).toEqual({
        name: "maintenance",
        message: "Configuring pebble layer for dummy-http-server",
      });
      expect(harness.deferred()).toHaveLength(1);

      await harness.emit("update-status");

      expect(harness.status()).toEqual({ name: "active", message: "" });
      expect(harness.deferred()).toEqual([]);
      expect(harness.plan(CONFIGURER).services["alertmanager-configurer"]?.command).toContain(
        "-port=9101 ",
      );
    });
  });

  describe("config-changed", () => {
    test("replans alertmanager-configurer with the new multitenant label", async () => {
      const harness = createHarness();
      await harness.addRelation("alertmanager", "alertmanager-k8s");
      await harness.containerPebbleReady(DUMMY);
      await harness.containerPebbleReady(CONFIGURER);

      harness.hookTools.charmConfig.multitenant_label = "tenant";
      await harness.emit("config-changed");

      expect(harness.plan(CONFIGURER).services["alertmanager-configurer"]?.command).toBe(
        "alertmanager_configurer -port=9101 " +
          "-alertmanager-conf=/etc/alertmanager/alertmanager.yml " +
          "-alertmanagerURL=localhost:80 " +
          "-multitenant-label=tenant " +
          "-delete-route-with-receiver=true ",
      );
      expect(harness.pebble(CONFIGURER).restarts).toHaveLength(2);
      expect(harness.status()).toEqual({ name: "active", message: "" });
    });
  });

  describe("alertmanager-configurer relation joined", () => {
    test("publishes the service name and port", async () => {
      const harness = createHarness();
      const relationId = await harness.addRelation(CONFIGURER, "configurer-client");

      await harness.addRelationUnit(relationId, "configurer-client/0");

      expect(harness.relationData(relationId, TEST_APP_NAME)).toEqual({
        service_name: TEST_APP_NAME,
        port: "9101",
      });
    });

    test("publishes the configured port", async () => {
      const harness = createHarness({ settings: { configurerPort: 1234 } });
      const relationId = await harness.addRelation(CONFIGURER, "configurer-client");

      await harness.addRelationUnit(relationId, "configurer-client/0");

      expect(harness.relationData(relationId, TEST_APP_NAME).port).toBe("1234");
    });

    test("leaves the data bag alone on a non-leader unit", async () => {
      const harness = createHarness({ leader: false });
      const relationId = await harness.addRelation(CONFIGURER, "configurer-client");

      await harness.addRelationUnit(relationId, "configurer-client/0");

      expect(harness.relationData(relationId, TEST_APP_NAME)).toEqual({});
    });
  });

  describe("alertmanager relation joined", () => {
    test("publishes the default config", async () => {
      const harness = createHarness();
      const relationId = await harness.addRelation("alertmanager", "alertmanager-k8s");

      await harness.addRelationUnit(relationId, "alertmanager-k8s/0");

      expect(harness.relationData(relationId, TEST_APP_NAME)).toEqual({
        alertmanager_config:
          '{"route":{"receiver":"default-receiver","group_by":["alertname"]},' +
          '"receivers":[{"name":"default-receiver"}]}',
        alertmanager_templates: "[]",
      });
    });
  });

  describe("alertmanager config file changed", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "alertmanager-configurer-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    const harnessWithConfigFile = async (content: string, leader = true) => {
      const configFile = join(dir, "alertmanager.yml");
      await writeFile(configFile, content, "utf-8");
      const harness = createHarness({ leader, settings: { configFile } });
      const relationId = await harness.addRelation("alertmanager", "alertmanager-k8s");
      await harness.addRelationUnit(relationId, "alertmanager-k8s/0");
      return { harness, relationId };
    };

    test("blocks when the config file does not exist", async () => {
      const harness = createHarness({ settings: { configFile: join(dir, "whatever.yml") } });
      const relationId = await harness.addRelation("alertmanager", "alertmanager-k8s");
      await harness.addRelationUnit(relationId, "alertmanager-k8s/0");

      await harness.emit("alertmanager_config_file_changed");

      expect(harness.status()).toEqual({
        name: "blocked",
        message: "Error reading Alertmanager config file",
      });
    });

    test("blocks when the config file is not valid YAML", async () => {
      const { harness } = await harnessWithConfigFile("route: [unclosed\n");

      await harness.emit("alertmanager_config_file_changed");

      expect(harness.status()).toEqual({
        name: "blocked",
        message: "Error reading Alertmanager config file",
      });
    });

    test("pushes the new config to the relation data bag", async () => {
      const { harness, relationId } = await harnessWithConfigFile(TEST_VALID_CONFIG);

      await harness.emit("alertmanager_config_file_changed");

      const data = harness.relationData(relationId, TEST_APP_NAME);
      expect(JSON.parse(data.alertmanager_config ?? "")).toEqual({
        global: { resolve_timeout: "5m" },
        route: { receiver: "team-a", group_wait: "30s" },
        receivers: [
          { name: "team-a", webhook_configs: [{ url: "http://127.0.0.1:5001/" }] },
        ],
      });
      expect(data.alertmanager_templates).toBe("[]");
      // The dummy HTTP server never started in this test
      expect(harness.status()).toEqual({
        name: "waiting",
        message: "Waiting for the dummy HTTP server to be ready",
      });
    });

    test("goes active and pushes the config when the workloads are ready", async () => {
      const { harness, relationId } = await harnessWithConfigFile(TEST_VALID_CONFIG);
      await harness.containerPebbleReady(DUMMY);

      await harness.emit("alertmanager_config_file_changed");

      expect(harness.status()).toEqual({ name: "active", message: "" });
      expect(
        JSON.parse(harness.relationData(relationId, TEST_APP_NAME).alertmanager_config ?? ""),
      ).toHaveProperty("route.receiver", "team-a");
    });

    test("sends template contents separately from the config", async () => {
      const templateFile = join(dir, "team-b.tmpl");
      await writeFile(templateFile, TEST_TEMPLATE, "utf-8");
      const { harness, relationId } = await harnessWithConfigFile(
        TEST_CONFIG_WITH_TEMPLATES(templateFile),
      );

      await harness.emit("alertmanager_config_file_changed");

      const data = harness.relationData(relationId, TEST_APP_NAME);
      expect(JSON.parse(data.alertmanager_config ?? "")).toEqual({
        route: { receiver: "team-b" },
        receivers: [{ name: "team-b" }],
      });
      expect(JSON.parse(data.alertmanager_templates ?? "")).toEqual([TEST_TEMPLATE]);
    });

    test("blocks and clears the data bag when the config is invalid", async () => {
      const { harness, relationId } = await harnessWithConfigFile(TEST_INVALID_CONFIG);

      await harness.emit("alertmanager_config_file_changed");

      expect(harness.status()).toEqual({
        name: "blocked",
        message: "Invalid Alertmanager configuration",
      });
      expect(harness.relationData(relationId, TEST_APP_NAME)).toEqual({});
    });

    test("does not touch the data bag on a non-leader unit", async () => {
      const { harness, relationId } = await harnessWithConfigFile(TEST_VALID_CONFIG, false);

      await harness.emit("alertmanager_config_file_changed");

      expect(harness.relationData(relationId, TEST_APP_NAME)).toEqual({});
    });
  });
});
