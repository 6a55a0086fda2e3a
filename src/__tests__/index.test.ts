import { describe, expect, it } from "vitest";
import * as ppak from "../index";

describe("package entry point", () => {
  it("exposes the project model, codec and assembler", () => {
    const project = new ppak.DeviceProject({ projectSlot: 2 });
    project.addHihat("a01", ppak.TICKS_PER_16TH);

    expect(ppak.encodePatternRecord(project.toSnapshot().patterns.a01)[2]).toBe(1);
    expect(ppak.getProjectTarMemberPath(project.projectSlot)).toBe("/projects/P02.tar");
    expect(ppak.PAD_RECORD_LENGTH).toBe(27);
    expect(ppak.MAX_PATTERN_EVENTS).toBe(255);
    expect(typeof ppak.saveProjectArchive).toBe("function");
    expect(typeof ppak.loadProjectTemplate).toBe("function");
  });
});
