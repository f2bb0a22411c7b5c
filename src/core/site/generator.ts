import { log } from "../../cli/log";
import { ExternalToolError } from "../errors";
import type { PostguideConfig } from "../config-loader";
import {
  quoteArg,
  runCommand,
  type CommandResult,
  type CommandRunner,
} from "../utils/run-commands";

type GeneratorOptions = {
  /** Print the command's output as it arrives. */
  stream?: boolean;
};

/**
 * The static-site generator, driven through its command line. Only exit
 * codes are interpreted; output is passed through for the user.
 */
export class Generator {
  private readonly config: Pick<PostguideConfig, "root" | "generator">;
  private readonly runner: CommandRunner;

  constructor(config: Pick<PostguideConfig, "root" | "generator">, runner: CommandRunner = runCommand) {
    this.config = config;
    this.runner = runner;
  }

  async newPost(slug: string): Promise<CommandResult> {
    return this.run(["new", this.config.generator.newPostLayout, slug], { stream: false });
  }

  async clean(): Promise<CommandResult> {
    return this.run(["clean"]);
  }

  async generate(): Promise<CommandResult> {
    return this.run(["generate"]);
  }

  async server(port: number): Promise<CommandResult> {
    return this.run(["server", "-p", String(port)]);
  }

  async deploy(): Promise<CommandResult> {
    return this.run(["deploy"]);
  }

  private async run(args: string[], options: GeneratorOptions = {}): Promise<CommandResult> {
    const { stream = true } = options;
    const commandLine = [this.config.generator.command, ...args.map((arg) => quoteArg(arg))].join(" ");
    const label = `${this.config.generator.command} ${args[0]}`;

    log.info(`Executing: ${commandLine}`);
    const result = await this.runner(commandLine, this.config.root, {
      onStdout: stream ? log.stream(label) : undefined,
      onStderr: stream ? log.stream(label, "warn") : undefined,
    });

    if (!result.ok) {
      const reason = (result.stderr || result.stdout).trim().split(/\r?\n/).pop() || "no output";
      throw new ExternalToolError(label, result.code, reason, result.stderr);
    }
    return result;
  }
}
