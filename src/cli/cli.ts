import { readFile } from "node:fs/promises";
import { basename, dirname, extname, resolve } from "node:path";
import { parseArgs } from "node:util";
import { createProjectArchiveFileName } from "../components/ArchiveAssembler/ArchiveAssembler.utilities";
import { createExampleProject } from "../components/ExampleBeat/ExampleBeat.utilities";
import { DeviceProject } from "../components/ProjectModel/ProjectModel";
import { getConfiguredDeviceSku } from "../shared/shared.config";
import { getErrorMessage } from "../shared/shared.errors";
import { parseProjectDescription, type ProjectDescription } from "./cli.schema";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const DEFAULT_EXAMPLE_OUTPUT = "example_beat.ppak";

export const USAGE = [
  "Usage:",
  "  ppak build <description.json> [--output <file>] [--template <path>] [--sounds <dir>]",
  "  ppak example [--output <file>] [--sku <id>] [--slot <n>] [--template <path>] [--sounds <dir>]",
].join("\n");

const CLI_OPTIONS = {
  output: { type: "string", short: "o" },
  template: { type: "string", short: "t" },
  sounds: { type: "string", short: "s" },
  sku: { type: "string" },
  slot: { type: "string" },
  help: { type: "boolean", short: "h" },
} as const;

const parseCliArguments = (argv: readonly string[]) => {
  return parseArgs({ args: [...argv], options: CLI_OPTIONS, allowPositionals: true });
};

interface ArchiveSources {
  outputPath: string;
  templatePath?: string;
  soundsDir?: string;
}

export const buildProjectFromDescription = (description: ProjectDescription): DeviceProject => {
  const project = new DeviceProject({
    deviceSku: description.deviceSku ?? getConfiguredDeviceSku(),
    projectSlot: description.projectSlot,
  });

  description.assignments.forEach(({ group, pad, sample }) => {
    project.assignSample(group, pad, sample);
  });
  description.events.forEach(({ pattern, time, pad, velocity }) => {
    project.addEvent(pattern, time, pad, velocity);
  });

  return project;
};

const readProjectDescription = async (descriptionPath: string): Promise<ProjectDescription> => {
  const payload: unknown = JSON.parse(await readFile(descriptionPath, "utf8"));
  return parseProjectDescription(payload);
};

const writeArchive = async (project: DeviceProject, { outputPath, templatePath, soundsDir }: ArchiveSources) => {
  if (templatePath) {
    await project.loadTemplate(templatePath);
  }

  const result = await project.save(outputPath, { soundsDir });
  console.log(`Created ${result.outputPath}`);
  result.memberPaths.forEach((memberPath) => console.log(`  ${memberPath}`));
};

const resolveFromDescription = (descriptionDirectory: string, value?: string): string | undefined => {
  return value ? resolve(descriptionDirectory, value) : undefined;
};

/**
 * Runs one CLI invocation and resolves with its exit code. Failures are
 * reported on stderr rather than thrown.
 */
export const runCli = async (argv: readonly string[]): Promise<number> => {
  let parsed: ReturnType<typeof parseCliArguments>;
  try {
    parsed = parseCliArguments(argv);
  } catch (error) {
    console.error(`ppak: ${getErrorMessage(error)}\n${USAGE}`);
    return EXIT_USAGE;
  }

  const { values, positionals } = parsed;
  const [command, descriptionPath] = positionals;

  if (values.help) {
    console.log(USAGE);
    return EXIT_SUCCESS;
  }

  try {
    if (command === "example" && positionals.length === 1) {
      const project = createExampleProject({
        deviceSku: values.sku ?? getConfiguredDeviceSku(),
        projectSlot: values.slot === undefined ? undefined : Number(values.slot),
      });
      await writeArchive(project, {
        outputPath: values.output ?? DEFAULT_EXAMPLE_OUTPUT,
        templatePath: values.template,
        soundsDir: values.sounds,
      });
      return EXIT_SUCCESS;
    }

    if (command === "build" && descriptionPath && positionals.length === 2) {
      const description = await readProjectDescription(descriptionPath);
      const descriptionDirectory = dirname(resolve(descriptionPath));
      await writeArchive(buildProjectFromDescription(description), {
        outputPath:
          values.output ??
          createProjectArchiveFileName(basename(descriptionPath, extname(descriptionPath))),
        templatePath: values.template ?? resolveFromDescription(descriptionDirectory, description.template),
        soundsDir: values.sounds ?? resolveFromDescription(descriptionDirectory, description.sounds),
      });
      return EXIT_SUCCESS;
    }
  } catch (error) {
    console.error(`ppak: ${getErrorMessage(error)}`);
    return EXIT_FAILURE;
  }

  console.error(USAGE);
  return EXIT_USAGE;
};
