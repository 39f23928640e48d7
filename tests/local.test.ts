import { LocalLauncher, buildWorkerArgs } from "../src/drivers/local.js";
import { STRUCTURE, nodeBackend, workerPath } from "./helpers.js";

describe("buildWorkerArgs", () => {
  test("passes only the structure path by default", () => {
    expect(buildWorkerArgs({ name: "mace", executable: "python" }, "POSCAR")).toEqual(["POSCAR"]);
  });

  test("puts the script first and the model id last", () => {
    const spec = {
      name: "uma",
      executable: "python",
      script: "bench_driver.py",
      modelId: "uma-s-1p1",
    };
    expect(buildWorkerArgs(spec, "POSCAR")).toEqual(["bench_driver.py", "POSCAR", "uma-s-1p1"]);
  });

  test("appends extra arguments after the model id", () => {
    const spec = {
      name: "uma",
      executable: "python",
      script: "bench_driver.py",
      modelId: "uma-s-1p1",
      args: ["omol"],
    };
    expect(buildWorkerArgs(spec, "POSCAR")).toEqual(["bench_driver.py", "POSCAR", "uma-s-1p1", "omol"]);
  });
});

describe("LocalLauncher", () => {
  test("launches the worker with the structure path and model id", async () => {
    const launcher = new LocalLauncher();
    const spec = nodeBackend("echo", "echo-model.cjs", { modelId: "-2.5" });

    const invocation = await launcher.launch(spec, STRUCTURE, { timeout: 10_000 });

    expect(invocation.command).toEqual([process.execPath, workerPath("echo-model.cjs"), STRUCTURE, "-2.5"]);
    expect(invocation.exitStatus).toEqual({ kind: "exited", code: 0, signal: null });
    expect(invocation.stdout).toBe('loading model -2.5\n{"mlip":"-2.5","energy":-2.5,"time":0.01}\n');
    expect(invocation.spec).toBe(spec);
    expect(invocation.inputPath).toBe(STRUCTURE);
  });

  test("passes extra arguments through to the worker", async () => {
    const launcher = new LocalLauncher();
    const spec = nodeBackend("uma", "task.cjs", { modelId: "uma-s-1p1", args: ["omol"] });

    const invocation = await launcher.launch(spec, STRUCTURE, { timeout: 10_000 });

    expect(invocation.command).toEqual([process.execPath, workerPath("task.cjs"), STRUCTURE, "uma-s-1p1", "omol"]);
    expect(invocation.stdout).toBe('{"mlip":"uma-s-1p1","task":"omol","energy":-2,"time":0.01}\n');
  });

  test("merges the spec's environment over the parent's", async () => {
    const launcher = new LocalLauncher({ env: { ...process.env, FAKE_ENERGY: "1" } });
    const spec = nodeBackend("env", "env.cjs", { env: { FAKE_ENERGY: "-9.75" } });

    const invocation = await launcher.launch(spec, STRUCTURE, { timeout: 10_000 });

    expect(invocation.stdout.trim()).toBe('{"mlip":"env","energy":-9.75,"time":0.01}');
  });

  test("records a missing executable as launch-failed", async () => {
    const launcher = new LocalLauncher();
    const invocation = await launcher.launch(
      { name: "ghost", executable: "/nonexistent/ghost-env/bin/python" },
      STRUCTURE,
      { timeout: 10_000 },
    );

    expect(invocation.exitStatus.kind).toBe("launch-failed");
  });

  test("a per-backend timeout overrides the run-wide one", async () => {
    const launcher = new LocalLauncher();
    const spec = nodeBackend("hang", "hang.cjs", { timeoutMs: 300 });

    const invocation = await launcher.launch(spec, STRUCTURE, { timeout: 60_000, killGraceMs: 200 });

    expect(invocation.exitStatus).toEqual({ kind: "timed-out", timeoutMs: 300 });
  });
});
