/**
 * Wires the engine components for one command invocation
 */

import type { RunConfig } from '../config/schema.js';
import type { GitFacade } from '../git/facade.js';
import { formatChoices, YES_NO_QUIT, type Answer, type Prompter } from '../ui/prompter.js';
import type { Reporter } from '../ui/reporter.js';
import type { Palette } from './colors.js';
import { ForkPointResolver } from './fork-point.js';
import type { BranchLayout } from './layout.js';
import { SquashMergeDetector } from './squash.js';
import type { LayoutStorage } from './store.js';
import { SyncStateClassifier } from './sync.js';

export interface EngineContext {
  readonly config: RunConfig;
  readonly git: GitFacade;
  readonly layout: BranchLayout;
  readonly store: LayoutStorage;
  readonly forkPoints: ForkPointResolver;
  readonly squash: SquashMergeDetector;
  readonly classifier: SyncStateClassifier;
  readonly palette: Palette;
  readonly reporter: Reporter;
  readonly prompter: Prompter;
}

export interface EngineDeps {
  config: RunConfig;
  git: GitFacade;
  layout: BranchLayout;
  store: LayoutStorage;
  palette: Palette;
  reporter: Reporter;
  prompter: Prompter;
}

export function createEngineContext(deps: EngineDeps): EngineContext {
  const forkPoints = new ForkPointResolver(deps.git, deps.layout, deps.reporter);
  const squash = new SquashMergeDetector(deps.git, forkPoints, deps.reporter);
  const classifier = new SyncStateClassifier(
    deps.git,
    deps.layout,
    forkPoints,
    squash,
    deps.config.squashMergeDetection
  );
  return { ...deps, forkPoints, squash, classifier };
}

export interface AskOptions {
  /** Printed instead of asking when running with --yes */
  yesMessage?: string;
  choices?: readonly Answer[];
  /** Answer without asking, e.g. `no` when pushing is disabled */
  override?: Answer;
}

/**
 * Ask for confirmation, honouring --yes and forced answers
 */
export async function ask(ctx: EngineContext, message: string, options: AskOptions = {}): Promise<Answer> {
  if (options.override) {
    return options.override;
  }
  const choices = options.choices ?? YES_NO_QUIT;
  if (ctx.config.yes && options.yesMessage) {
    ctx.reporter.info(options.yesMessage);
    return 'yes';
  }
  ctx.reporter.debug(`asking: ${message} ${formatChoices(choices)}`);
  return ctx.prompter.ask(message, choices);
}
