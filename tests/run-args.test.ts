import { describe, expect, it } from "vitest";

import { addJupyterArgs, composeDockerRunArgs, makeContainerName } from "../src/docker/run-args.js";
import { ConfigError } from "../src/errors.js";

describe("composeDockerRunArgs", () => {
  it("keeps required flags, drops optional flags the user already passed", () => {
    const userArgs = ["-arg1", "-arg2=y2", "-arg3", "y3"];
    const args = composeDockerRunArgs({
      hostRoot: "/h",
      containerRoot: "/home/pipeline/projectname",
      optionalArgs: [
        ["-arg1", "projectname"],
        ["--arg4", "x4"],
      ],
      requiredArgs: [
        ["-arg2", null],
        ["-arg3", "x2"],
      ],
      userArgs,
    });

    expect(args).toEqual(["-arg2", "-arg3", "x2", "--arg4", "x4", ...userArgs]);
  });

  it("renders each mount volume as a -v binding before the user args", () => {
    const args = composeDockerRunArgs({
      hostRoot: "/h",
      containerRoot: "/c/proj",
      mountVolumes: ["conf/local", "data", "logs"],
      userArgs: ["-v", "y1"],
    });

    expect(args).toEqual([
      "-v",
      "/h/conf/local:/c/proj/conf/local",
      "-v",
      "/h/data:/c/proj/data",
      "-v",
      "/h/logs:/c/proj/logs",
      "-v",
      "y1",
    ]);
  });

  it("orders required flags, mounts, optional flags, then user tokens", () => {
    const args = composeDockerRunArgs({
      requiredArgs: [["-p", "8888:8888"]],
      optionalArgs: [["--rm"], ["--name", "proj-run"]],
      hostRoot: "/h",
      containerRoot: "/c/proj",
      mountVolumes: ["data", "logs"],
      userArgs: ["--env", "MODE=test"],
    });

    expect(args).toEqual([
      "-p",
      "8888:8888",
      "-v",
      "/h/data:/c/proj/data",
      "-v",
      "/h/logs:/c/proj/logs",
      "--rm",
      "--name",
      "proj-run",
      "--env",
      "MODE=test",
    ]);
  });

  it("emits a required flag even when the user passed it too", () => {
    const args = composeDockerRunArgs({
      requiredArgs: [["--build-arg", "A=1"]],
      userArgs: ["--build-arg", "B=2"],
    });

    expect(args).toEqual(["--build-arg", "A=1", "--build-arg", "B=2"]);
  });

  it("suppresses an optional flag given in --flag=value form", () => {
    const args = composeDockerRunArgs({
      optionalArgs: [["--name", "generated"], ["--rm"]],
      userArgs: ["--name=mine"],
    });

    expect(args).toEqual(["--rm", "--name=mine"]);
  });

  it("does not treat aliases as the same flag", () => {
    const args = composeDockerRunArgs({
      optionalArgs: [["--publish", "8888:8888"]],
      userArgs: ["-p", "9999:8888"],
    });

    expect(args).toEqual(["--publish", "8888:8888", "-p", "9999:8888"]);
  });

  it("treats an empty value as a switch", () => {
    expect(composeDockerRunArgs({ optionalArgs: [["--rm", ""]] })).toEqual(["--rm"]);
  });

  it("returns an empty list when nothing is requested", () => {
    expect(composeDockerRunArgs()).toEqual([]);
  });

  it.each([
    [null, "/c/proj"],
    ["/h", null],
    [null, null],
    ["", "/c/proj"],
  ])("rejects mount volumes with hostRoot=%s containerRoot=%s", (hostRoot, containerRoot) => {
    const compose = () =>
      composeDockerRunArgs({ hostRoot, containerRoot, mountVolumes: ["conf/local", "data", "logs"] });

    expect(compose).toThrow(ConfigError);
    expect(compose).toThrow(
      "Both `hostRoot` and `containerRoot` must be specified in " +
        "`composeDockerRunArgs` call if `mountVolumes` are provided."
    );
  });

  it("does not require roots when no volumes are mounted", () => {
    expect(composeDockerRunArgs({ mountVolumes: [], userArgs: ["--rm"] })).toEqual(["--rm"]);
  });
});

describe("addJupyterArgs", () => {
  it.each([
    [[], ["--ip", "0.0.0.0", "--no-browser"]],
    [["--no-browser"], ["--no-browser", "--ip", "0.0.0.0"]],
    [["--foo", "ip"], ["--foo", "ip", "--ip", "0.0.0.0", "--no-browser"]],
    [["--foo", "ip", "--ip"], ["--foo", "ip", "--ip", "--no-browser"]],
    [["--foo", "--no-browser", "--ip=baz"], ["--foo", "--no-browser", "--ip=baz"]],
    [
      ["--foo", "--no-browser=bar", "--ip=baz"],
      ["--foo", "--no-browser=bar", "--ip=baz", "--no-browser"],
    ],
  ])("%j -> %j", (runArgs, expected) => {
    expect(addJupyterArgs(runArgs)).toEqual(expected);
  });

  it("leaves the input untouched", () => {
    const runArgs = ["--foo"];
    addJupyterArgs(runArgs);
    expect(runArgs).toEqual(["--foo"]);
  });
});

describe("makeContainerName", () => {
  it.each([
    [["image-name-with-suffix"]],
    [["image name with  suffix"]],
    [["image!name", "with-suffix"]],
    [["image!&+=*name", "with-suffix"]],
  ])("normalizes %j", (parts) => {
    expect(makeContainerName(...parts)).toBe("image-name-with-suffix");
  });

  it("drops leading and trailing separators", () => {
    expect(makeContainerName("_registry/img:latest", "run")).toBe("registry-img-latest-run");
  });
});
