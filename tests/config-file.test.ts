import { writeFileSync } from "node:fs";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { loadConfigFile, loadPluginConfig, mergeConfigs } from "../src/config-file.js";
import { ConfigError } from "../src/errors.js";
import { withTempDir } from "./utils/tmpdir.js";

describe("config files", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it(
    "returns null for a missing file",
    withTempDir((base) => {
      expect(loadConfigFile(join(base, "absent.yaml"))).toBeNull();
    })
  );

  it(
    "treats an empty file as no settings",
    withTempDir((base) => {
      const path = join(base, "empty.yaml");
      writeFileSync(path, "");

      expect(loadConfigFile(path)).toEqual({});
    })
  );

  it(
    "reads every supported key",
    withTempDir((base) => {
      const path = join(base, "pipeline-docker.yaml");
      writeFileSync(
        path,
        [
          "image: registry.local/etl:1",
          "cli: etl",
          "containerRoot: /srv/app",
          "volumes: [data, logs]",
          "port: 9000",
          "uid: 1001",
          "gid: 0",
          "dockerArgs: --memory 4g",
          "",
        ].join("\n")
      );

      expect(loadConfigFile(path)).toEqual({
        image: "registry.local/etl:1",
        cli: "etl",
        containerRoot: "/srv/app",
        volumes: ["data", "logs"],
        port: 9000,
        uid: 1001,
        gid: 0,
        dockerArgs: "--memory 4g",
      });
    })
  );

  it(
    "drops values of the wrong type with a warning",
    withTempDir((base) => {
      const path = join(base, "pipeline-docker.yaml");
      writeFileSync(path, "image: etl\nport: high\nvolumes: data\n");

      expect(loadConfigFile(path)).toEqual({ image: "etl" });
      expect(console.warn).toHaveBeenCalledTimes(2);
    })
  );

  it(
    "rejects a document that is not a mapping",
    withTempDir((base) => {
      const path = join(base, "pipeline-docker.yaml");
      writeFileSync(path, "- image\n- etl\n");

      expect(() => loadConfigFile(path)).toThrow(ConfigError);
    })
  );

  it(
    "rejects malformed YAML",
    withTempDir((base) => {
      const path = join(base, "pipeline-docker.yaml");
      writeFileSync(path, "image: [unclosed\n");

      expect(() => loadConfigFile(path)).toThrow(`Failed to parse config file ${path}`);
    })
  );

  it("merges later configs over earlier ones", () => {
    expect(mergeConfigs({ image: "a", port: 1 }, null, { port: 2, cli: "etl" })).toEqual({
      image: "a",
      port: 2,
      cli: "etl",
    });
  });

  it(
    "layers the project config over the global one",
    withTempDir((base) => {
      const globalPath = join(base, "global.yaml");
      writeFileSync(globalPath, "image: global-image\nport: 9000\n");
      writeFileSync(join(base, "pipeline-docker.yml"), "image: project-image\n");

      expect(loadPluginConfig(base, globalPath)).toEqual({ image: "project-image", port: 9000 });
    })
  );

  it(
    "uses the first project config file found",
    withTempDir((base) => {
      writeFileSync(join(base, "pipeline-docker.yaml"), "cli: first\n");
      writeFileSync(join(base, ".pipeline-docker.yaml"), "cli: last\n");

      expect(loadPluginConfig(base, join(base, "absent.yaml"))).toEqual({ cli: "first" });
    })
  );
});
