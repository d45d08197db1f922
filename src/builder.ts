/**
 * Builder - Pipeline orchestrator
 * Coordinates the build pipeline with zero business logic
 */

import path from "path";
import { isDirectory, Logger, runGit, Tracker, type GitRunner } from "./utils";
import * as modules from "./modules";
import type { BuildConfig, BuildContext, SectionDefinition } from "./types";

export class ContentRootNotFoundError extends Error {
  constructor(public readonly contentRoot: string) {
    super(`Content root not found: ${contentRoot}`);
    this.name = "ContentRootNotFoundError";
  }
}

export interface BuilderOptions {
  sections?: SectionDefinition[]; // Defaults to config.sections
  tracker?: Tracker;
  logger?: Logger;
  now?: Date;
  git?: GitRunner;
  verbose?: boolean;
}

export type StepListener = (label: string) => void;

const STEPS: [string, (ctx: BuildContext) => Promise<void>][] = [
  ["Reading revision...", modules.revision],
  ["Resolving navigation...", modules.resolve],
  ["Scanning sections...", modules.scan],
  ["Assembling chapters...", modules.process],
  ["Rendering cover...", modules.cover],
  ["Writing EPUB...", modules.write],
];

export class HandbookBuilder {
  constructor(
    private config: BuildConfig,
    private options: BuilderOptions = {},
  ) {}

  /**
   * Run the build pipeline
   * Throws ContentRootNotFoundError before anything is written when the
   * content root is missing.
   */
  async run(onStep?: StepListener): Promise<BuildContext> {
    const contentRoot = path.resolve(this.config.repoPath, this.config.content.root);
    if (!(await isDirectory(contentRoot))) {
      throw new ContentRootNotFoundError(contentRoot);
    }

    const ctx: BuildContext = {
      config: this.config,
      tracker: this.options.tracker ?? new Tracker(),
      logger: this.options.logger ?? new Logger(this.config.logging.level),
      sections: this.options.sections ?? this.config.sections,
      now: this.options.now ?? new Date(),
      git: this.options.git ?? runGit,
      verbose: this.options.verbose ?? false,
      contentRoot,
    };

    for (const [label, step] of STEPS) {
      onStep?.(label);
      await step(ctx);
    }

    return ctx;
  }
}
