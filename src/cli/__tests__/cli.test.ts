import JSZip from "jszip";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { extractTarArchive } from "../../integrations/tar/tar.utilities";
import { EXIT_FAILURE, EXIT_SUCCESS, EXIT_USAGE, USAGE, runCli } from "../cli";
import { parseProjectDescription } from "../cli.schema";

let workDirectory = "";

beforeEach(async () => {
  workDirectory = await mkdtemp(join(tmpdir(), "ppak-cli-test-"));
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
  await rm(workDirectory, { recursive: true, force: true });
});

const readMember = async (containerPath: string, memberName: string): Promise<Uint8Array> => {
  const zip = await JSZip.loadAsync(await readFile(containerPath));
  const member = zip.file(memberName);
  if (!member) {
    throw new Error(`missing member ${memberName}`);
  }
  return member.async("uint8array");
};

const readTarFile = async (containerPath: string, tarMember: string, fileName: string) => {
  const entry = extractTarArchive(await readMember(containerPath, tarMember)).find(
    (candidate) => candidate.name === fileName
  );
  return Array.from(entry?.data ?? new Uint8Array());
};

describe("ppak example", () => {
  it("writes the example project and lists its members", async () => {
    const outputPath = join(workDirectory, "beat.ppak");

    const exitCode = await runCli(["example", "--output", outputPath, "--sku", "TE000XX777", "--slot", "2"]);

    expect(exitCode).toBe(EXIT_SUCCESS);
    expect(console.log).toHaveBeenNthCalledWith(1, `Created ${outputPath}`);
    expect(console.log).toHaveBeenNthCalledWith(2, "  /projects/P02.tar");
    expect(console.log).toHaveBeenNthCalledWith(3, "  /meta.json");

    const meta = JSON.parse(new TextDecoder().decode(await readMember(outputPath, "/meta.json")));
    expect(meta.device_sku).toBe("TE000XX777");
    expect(meta.base_sku).toBe("TE000XX777");
  });

  it("uses the configured device SKU when none is passed", async () => {
    vi.stubEnv("PPAK_DEVICE_SKU", "TE000XX555");
    const outputPath = join(workDirectory, "configured.ppak");

    expect(await runCli(["example", "-o", outputPath])).toBe(EXIT_SUCCESS);

    const meta = JSON.parse(new TextDecoder().decode(await readMember(outputPath, "/meta.json")));
    expect(meta.device_sku).toBe("TE000XX555");
  });

  it("reports an invalid slot", async () => {
    const exitCode = await runCli(["example", "-o", join(workDirectory, "x.ppak"), "--slot", "abc"]);

    expect(exitCode).toBe(EXIT_FAILURE);
    expect(console.error).toHaveBeenCalledWith("ppak: Invalid project slot: NaN. Must be 1-9");
  });
});

describe("ppak build", () => {
  it("builds a project from a description with paths relative to it", async () => {
    await mkdir(join(workDirectory, "samples"));
    await writeFile(join(workDirectory, "samples", "kick.wav"), Buffer.from([9, 9]));
    const descriptionPath = join(workDirectory, "groove.json");
    await writeFile(
      descriptionPath,
      JSON.stringify({
        deviceSku: "TE000XX001",
        projectSlot: 5,
        sounds: "samples",
        assignments: [{ group: "b", pad: 1, sample: 42 }],
        events: [{ pattern: "b01", time: 24, pad: 1 }],
      })
    );
    const outputPath = join(workDirectory, "groove.ppak");

    const exitCode = await runCli(["build", descriptionPath, "--output", outputPath]);

    expect(exitCode).toBe(EXIT_SUCCESS);
    expect(console.log).toHaveBeenCalledWith("  /sounds/kick.wav");

    const padBytes = await readTarFile(outputPath, "/projects/P05.tar", "pads/b/p01");
    expect(padBytes.slice(0, 3)).toEqual([0, 42, 0]);
    expect(await readTarFile(outputPath, "/projects/P05.tar", "patterns/b01")).toEqual([
      0x00, 0x01, 0x01, 0x00,
      24, 0, 0, 0x3c, 100, 0x10, 0, 0,
    ]);
    expect(Array.from(await readMember(outputPath, "/sounds/kick.wav"))).toEqual([9, 9]);
  });

  it("reports out-of-range values from the description", async () => {
    const descriptionPath = join(workDirectory, "bad-group.json");
    await writeFile(descriptionPath, JSON.stringify({ assignments: [{ group: "x", pad: 1, sample: 1 }] }));

    const exitCode = await runCli(["build", descriptionPath, "-o", join(workDirectory, "bad.ppak")]);

    expect(exitCode).toBe(EXIT_FAILURE);
    expect(console.error).toHaveBeenCalledWith("ppak: Invalid group: x. Must be 'a', 'b', 'c', or 'd'");
  });

  it("reports malformed JSON", async () => {
    const descriptionPath = join(workDirectory, "broken.json");
    await writeFile(descriptionPath, "{ not json");

    const exitCode = await runCli(["build", descriptionPath, "-o", join(workDirectory, "broken.ppak")]);

    expect(exitCode).toBe(EXIT_FAILURE);
    expect(console.error).toHaveBeenCalledWith(expect.stringMatching(/^ppak: /));
  });
});

describe("usage errors", () => {
  it("prints usage without a command", async () => {
    expect(await runCli([])).toBe(EXIT_USAGE);
    expect(console.error).toHaveBeenCalledWith(USAGE);
  });

  it("rejects unknown commands and missing description paths", async () => {
    expect(await runCli(["frobnicate"])).toBe(EXIT_USAGE);
    expect(await runCli(["build"])).toBe(EXIT_USAGE);
  });

  it("rejects unknown options", async () => {
    expect(await runCli(["example", "--bogus"])).toBe(EXIT_USAGE);
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining("Unknown option '--bogus'"));
  });

  it("prints usage for --help", async () => {
    expect(await runCli(["--help"])).toBe(EXIT_SUCCESS);
    expect(console.log).toHaveBeenCalledWith(USAGE);
  });
});

describe("parseProjectDescription", () => {
  it("fills in empty assignment and event lists", () => {
    expect(parseProjectDescription({ deviceSku: "TE000XX001" })).toEqual({
      deviceSku: "TE000XX001",
      assignments: [],
      events: [],
    });
  });

  it("lists schema problems with their paths", () => {
    expect(() => parseProjectDescription({ assignments: [{ group: "a", pad: "one", sample: 1 }] })).toThrow(
      "Invalid project description: assignments.0.pad: Expected number, received string"
    );
    expect(() => parseProjectDescription([])).toThrow(
      "Invalid project description: (root): Expected object, received array"
    );
  });
});
