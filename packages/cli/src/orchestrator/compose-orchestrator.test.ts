import { describe, it, expect, vi, beforeEach } from "vitest";
import { EventEmitter } from "node:events";
import { pino } from "pino";

// ---------------------------------------------------------------------------
// Mock child_process — spawn returns a fake child that exits on the next tick
// ---------------------------------------------------------------------------

const { mockSpawn } = vi.hoisted(() => ({ mockSpawn: vi.fn() }));

vi.mock("node:child_process", () => ({
  spawn: mockSpawn,
}));

function fakeChild(
  outcome:
    | { code: number | null; signal?: NodeJS.Signals }
    | { error: Error },
) {
  const child = new EventEmitter();
  setImmediate(() => {
    if ("error" in outcome) {
      child.emit("error", outcome.error);
    } else {
      child.emit("close", outcome.code, outcome.signal ?? null);
    }
  });
  return child;
}

// ---------------------------------------------------------------------------
import { ComposeOrchestrator, quoteForCmd } from "./compose-orchestrator.js";
import { OrchestrationError } from "../errors.js";

const logger = pino({ level: "silent" });

function makeOrchestrator(
  overrides?: Partial<ConstructorParameters<typeof ComposeOrchestrator>[0]>,
) {
  return new ComposeOrchestrator({
    cwd: "/srv/stack",
    composeFile: "docker-compose.yml",
    command: ["docker", "compose"],
    logger,
    platform: "linux",
    ...overrides,
  });
}

beforeEach(() => {
  vi.clearAllMocks();
  mockSpawn.mockImplementation(() => fakeChild({ code: 0 }));
});

// ===========================================================================
// up
// ===========================================================================
describe("up", () => {
  it("issues exactly one build-and-detach invocation", async () => {
    await makeOrchestrator().up({ build: true, detached: true, profiles: [] });

    expect(mockSpawn).toHaveBeenCalledTimes(1);
    expect(mockSpawn).toHaveBeenCalledWith(
      "docker",
      ["compose", "-f", "docker-compose.yml", "up", "--build", "-d"],
      { cwd: "/srv/stack", stdio: "inherit", shell: false },
    );
  });

  it("passes project name and profiles before the subcommand", async () => {
    const orchestrator = makeOrchestrator({
      command: ["docker-compose"],
      projectName: "whisper",
    });
    await orchestrator.up({ build: true, detached: true, profiles: ["monitoring"] });

    const [bin, args] = mockSpawn.mock.calls[0];
    expect(bin).toBe("docker-compose");
    expect(args).toEqual([
      "-f", "docker-compose.yml",
      "-p", "whisper",
      "--profile", "monitoring",
      "up", "--build", "-d",
    ]);
  });

  it("omits flags that are not requested", async () => {
    await makeOrchestrator().up({ build: false, detached: false, profiles: [] });
    expect(mockSpawn.mock.calls[0][1]).toEqual([
      "compose", "-f", "docker-compose.yml", "up",
    ]);
  });

  it("rejects with the exit code when compose fails", async () => {
    mockSpawn.mockImplementation(() => fakeChild({ code: 17 }));

    const err = await makeOrchestrator()
      .up({ build: true, detached: true, profiles: [] })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(OrchestrationError);
    const orchestrationErr = err as OrchestrationError;
    expect(orchestrationErr.exitCode).toBe(17);
    expect(orchestrationErr.code).toBe(17);
    expect(orchestrationErr.message).toBe(
      '"docker compose -f docker-compose.yml up --build -d" exited with code 17',
    );
  });

  it("reports termination by signal with exit code 1", async () => {
    mockSpawn.mockImplementation(() => fakeChild({ code: null, signal: "SIGINT" }));

    const err = await makeOrchestrator()
      .up({ build: true, detached: true, profiles: [] })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(OrchestrationError);
    expect((err as OrchestrationError).exitCode).toBe(1);
    expect((err as OrchestrationError).message).toBe(
      '"docker compose -f docker-compose.yml up --build -d" was terminated by SIGINT',
    );
  });

  it("rejects when the binary cannot be launched", async () => {
    mockSpawn.mockImplementation(() =>
      fakeChild({ error: new Error("spawn docker ENOENT") }),
    );

    await expect(
      makeOrchestrator().up({ build: true, detached: true, profiles: [] }),
    ).rejects.toThrow(
      'Could not run "docker compose -f docker-compose.yml up --build -d": spawn docker ENOENT',
    );
  });
});

// ===========================================================================
// down / logs
// ===========================================================================
describe("down", () => {
  it("tears down with the given profiles", async () => {
    await makeOrchestrator().down({ profiles: ["monitoring"] });
    expect(mockSpawn.mock.calls[0][1]).toEqual([
      "compose", "-f", "docker-compose.yml", "--profile", "monitoring", "down",
    ]);
  });
});

describe("logs", () => {
  it("follows one service", async () => {
    await makeOrchestrator().logs("whisper-api", { follow: true });
    expect(mockSpawn.mock.calls[0][1]).toEqual([
      "compose", "-f", "docker-compose.yml", "logs", "-f", "whisper-api",
    ]);
  });
});

// ===========================================================================
// Platform handling
// ===========================================================================
describe("platform", () => {
  it("runs one pre-quoted line through the shell on Windows", async () => {
    await makeOrchestrator({ platform: "win32" }).down({ profiles: [] });
    expect(mockSpawn).toHaveBeenCalledWith(
      "docker compose -f docker-compose.yml down",
      { cwd: "/srv/stack", stdio: "inherit", shell: true },
    );
  });

  it("keeps paths with spaces and metacharacters intact on Windows", async () => {
    const orchestrator = makeOrchestrator({
      platform: "win32",
      composeFile: "my compose.yml",
    });
    await orchestrator.logs("api&calc", { follow: true });

    expect(mockSpawn.mock.calls[0][0]).toBe(
      'docker compose -f "my compose.yml" logs -f "api&calc"',
    );
  });

  it("rejects an empty compose command", () => {
    expect(() => makeOrchestrator({ command: [] })).toThrow(
      "Compose command must not be empty",
    );
  });
});

describe("quoteForCmd", () => {
  it.each([
    ["docker-compose.yml", "docker-compose.yml"],
    ["C:\\stack\\docker-compose.yml", "C:\\stack\\docker-compose.yml"],
    ["my compose.yml", '"my compose.yml"'],
    ['say "hi"', '"say ""hi"""'],
    ["a|b", '"a|b"'],
  ])("%s → %s", (arg, expected) => {
    expect(quoteForCmd(arg)).toBe(expected);
  });
});
