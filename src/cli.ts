/**
 * CLI argument parsing and command routing
 */

import * as clack from '@clack/prompts';
import pc from 'picocolors';
import { addCommand } from './commands/add.js';
import { advanceCommand } from './commands/advance.js';
import { annoCommand } from './commands/anno.js';
import { deleteUnmanagedCommand } from './commands/delete-unmanaged.js';
import { discoverCommand } from './commands/discover.js';
import { fileCommand } from './commands/file.js';
import { forkPointCommand, type ForkPointAction } from './commands/fork-point.js';
import { goCommand, showCommand } from './commands/go.js';
import { isManagedCommand } from './commands/is-managed.js';
import { listCommand } from './commands/list.js';
import { slideOutCommand, type SlideOutCommandOptions } from './commands/slide-out.js';
import { statusCommand, type StatusCommandOptions } from './commands/status.js';
import { traverseCommand, type TraverseCommandOptions } from './commands/traverse.js';
import type { RunFlags } from './config/manager.js';
import { isSquashMergeDetection } from './config/schema.js';
import type { DiscoverOptions } from './stack/discover.js';
import { isListCategory, LIST_CATEGORIES } from './stack/listing.js';
import type { AddOptions } from './stack/mutations.js';
import { parseDirection } from './stack/navigation.js';
import { isReturnTo } from './stack/traverse.js';

export const VERSION = '0.1.0';

/**
 * Split `--name=value` into its parts; other arguments come back unchanged
 */
function splitOption(arg: string): [string, string | undefined] {
  if (arg.startsWith('--')) {
    const eq = arg.indexOf('=');
    if (eq !== -1) return [arg.slice(0, eq), arg.slice(eq + 1)];
  }
  return [arg, undefined];
}

function usageError(message: string, help: () => void): never {
  clack.log.error(message);
  help();
  process.exit(1);
}

/**
 * Value of an option given as `--name=value` or `--name value`
 */
function optionValue(
  args: string[],
  i: number,
  inline: string | undefined,
  help: () => void
): [string, number] {
  if (inline !== undefined) return [inline, i];
  const next = args[i + 1];
  if (next === undefined) {
    usageError(`Option ${args[i]} requires a value`, help);
  }
  return [next, i + 1];
}

/**
 * Pull the flags every command accepts out of the argument list
 */
function extractGlobalFlags(args: string[]): { flags: RunFlags; rest: string[] } {
  const flags: RunFlags = {};
  const rest: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    const [name, inline] = splitOption(arg);
    switch (name) {
      case '--debug':
        flags.debug = true;
        break;
      case '--verbose':
        flags.verbose = true;
        break;
      case '-y':
      case '--yes':
        flags.yes = true;
        break;
      case '--ascii-only':
        flags.asciiOnly = true;
        break;
      case '--squash-merge-detection': {
        const [value, next] = optionValue(args, i, inline, showHelp);
        if (!isSquashMergeDetection(value)) {
          usageError(
            `Invalid value for --squash-merge-detection: ${value} (expected none, simple or exact)`,
            showHelp
          );
        }
        flags.squashMergeDetection = value;
        i = next;
        break;
      }
      default:
        rest.push(arg);
    }
  }
  return { flags, rest };
}

export async function runCLI(argv: string[]): Promise<void> {
  const { flags, rest: args } = extractGlobalFlags(argv);
  const [command, ...rest] = args;

  // Show help if no command or --help flag
  if (!command || command === 'help' || command === '--help' || command === '-h') {
    showHelp();
    return;
  }

  if (command === '--version' || command === '-v' || command === 'version') {
    showVersion();
    return;
  }

  try {
    switch (command) {
      case 's':
      case 'status':
        await handleStatusCommand(flags, rest);
        break;

      case 't':
      case 'traverse':
        await handleTraverseCommand(flags, rest);
        break;

      case 'fork-point':
        await handleForkPointCommand(flags, rest);
        break;

      case 'slide-out':
        await handleSlideOutCommand(flags, rest);
        break;

      case 'advance':
        if (wantsHelp(rest)) return showAdvanceHelp();
        await advanceCommand(flags);
        break;

      case 'add':
        await handleAddCommand(flags, rest);
        break;

      case 'discover':
        await handleDiscoverCommand(flags, rest);
        break;

      case 'delete-unmanaged':
        if (wantsHelp(rest)) return showDeleteUnmanagedHelp();
        await deleteUnmanagedCommand(flags);
        break;

      case 'g':
      case 'go':
        await handleGoCommand(flags, rest);
        break;

      case 'show':
        await handleShowCommand(flags, rest);
        break;

      case 'list':
        await handleListCommand(flags, rest);
        break;

      case 'is-managed':
        if (wantsHelp(rest)) return showIsManagedHelp();
        await isManagedCommand(flags, rest[0]);
        break;

      case 'anno':
        await handleAnnoCommand(flags, rest);
        break;

      case 'file':
        if (wantsHelp(rest)) return showFileHelp();
        await fileCommand(flags);
        break;

      default:
        clack.log.error(`Unknown command: ${command}`);
        console.log('');
        showHelp();
        process.exit(1);
    }
  } catch (error) {
    clack.log.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

function wantsHelp(args: string[]): boolean {
  return args.includes('-h') || args.includes('--help');
}

async function handleStatusCommand(flags: RunFlags, args: string[]): Promise<void> {
  const options: StatusCommandOptions = {};

  for (const arg of args) {
    switch (arg) {
      case '-l':
      case '--list-commits':
        options.listCommits = true;
        break;
      case '-L':
      case '--list-commits-with-hashes':
        options.listCommitsWithHashes = true;
        break;
      case '-h':
      case '--help':
        showStatusHelp();
        return;
      default:
        usageError(`Unexpected argument: ${arg}`, showStatusHelp);
    }
  }

  await statusCommand(flags, options);
}

async function handleTraverseCommand(flags: RunFlags, args: string[]): Promise<void> {
  const options: TraverseCommandOptions = {};

  for (let i = 0; i < args.length; i++) {
    const [arg, inline] = splitOption(args[i] ?? '');

    switch (arg) {
      case '-F':
      case '--fetch':
        options.fetch = true;
        break;
      case '-l':
      case '--list-commits':
        options.listCommits = true;
        break;
      case '-M':
      case '--merge':
        options.merge = true;
        break;
      case '-n':
      case '--no-edit-merge':
        options.noEditMerge = true;
        break;
      case '--no-interactive-rebase':
        options.noInteractiveRebase = true;
        break;
      case '--push':
        options.pushTracked = true;
        break;
      case '--no-push':
        options.pushTracked = false;
        break;
      case '--push-untracked':
        options.pushUntracked = true;
        break;
      case '--no-push-untracked':
        options.pushUntracked = false;
        break;
      case '--return-to': {
        const [value, next] = optionValue(args, i, inline, showTraverseHelp);
        if (!isReturnTo(value)) {
          usageError(`Invalid value for --return-to: ${value}`, showTraverseHelp);
        }
        options.returnTo = value;
        i = next;
        break;
      }
      case '--start-from': {
        const [value, next] = optionValue(args, i, inline, showTraverseHelp);
        options.startFrom = value;
        i = next;
        break;
      }
      case '--stop-after': {
        const [value, next] = optionValue(args, i, inline, showTraverseHelp);
        options.stopAfter = value;
        i = next;
        break;
      }
      case '-w':
      case '--whole':
        options.startFrom = 'first-root';
        options.returnTo = 'nearest-remaining';
        options.noEditMerge = true;
        break;
      case '-h':
      case '--help':
        showTraverseHelp();
        return;
      default:
        usageError(`Unexpected argument: ${arg}`, showTraverseHelp);
    }
  }

  await traverseCommand(flags, options);
}

async function handleForkPointCommand(flags: RunFlags, args: string[]): Promise<void> {
  let action: ForkPointAction = { kind: 'show' };
  let branch: string | undefined;
  let actions = 0;

  for (let i = 0; i < args.length; i++) {
    const [arg, inline] = splitOption(args[i] ?? '');

    switch (arg) {
      case '--inferred':
        action = { kind: 'inferred' };
        actions++;
        break;
      case '--override-to': {
        const [revision, next] = optionValue(args, i, inline, showForkPointHelp);
        action = { kind: 'override-to', revision };
        actions++;
        i = next;
        break;
      }
      case '--override-to-inferred':
        action = { kind: 'override-to-inferred' };
        actions++;
        break;
      case '--override-to-parent':
        action = { kind: 'override-to-parent' };
        actions++;
        break;
      case '--unset-override':
        action = { kind: 'unset-override' };
        actions++;
        break;
      case '-h':
      case '--help':
        showForkPointHelp();
        return;
      default:
        if (arg.startsWith('-') || branch !== undefined) {
          usageError(`Unexpected argument: ${arg}`, showForkPointHelp);
        }
        branch = arg;
    }
  }

  if (actions > 1) {
    usageError(
      'Options --inferred, --override-to*, and --unset-override are mutually exclusive',
      showForkPointHelp
    );
  }

  await forkPointCommand(flags, branch, action);
}

async function handleSlideOutCommand(flags: RunFlags, args: string[]): Promise<void> {
  const options: SlideOutCommandOptions = {};
  const branches: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const [arg, inline] = splitOption(args[i] ?? '');

    switch (arg) {
      case '-d':
      case '--down-fork-point': {
        const [value, next] = optionValue(args, i, inline, showSlideOutHelp);
        options.downForkPoint = value;
        i = next;
        break;
      }
      case '--delete':
        options.deleteBranches = true;
        break;
      case '-M':
      case '--merge':
        options.merge = true;
        break;
      case '-n':
      case '--no-edit-merge':
        options.noEditMerge = true;
        break;
      case '--no-interactive-rebase':
        options.noInteractiveRebase = true;
        break;
      case '--removed-from-remote':
        options.removedFromRemote = true;
        break;
      case '-h':
      case '--help':
        showSlideOutHelp();
        return;
      default:
        if (arg.startsWith('-')) {
          usageError(`Unexpected argument: ${arg}`, showSlideOutHelp);
        }
        branches.push(arg);
    }
  }

  if (options.removedFromRemote && (branches.length > 0 || options.downForkPoint || options.merge)) {
    usageError('--removed-from-remote takes no branches and only --delete besides it', showSlideOutHelp);
  }
  if (options.downForkPoint && options.merge) {
    usageError('Options --down-fork-point and --merge cannot be used together', showSlideOutHelp);
  }

  await slideOutCommand(flags, branches, options);
}

async function handleAddCommand(flags: RunFlags, args: string[]): Promise<void> {
  const options: AddOptions = {};
  let branch: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const [arg, inline] = splitOption(args[i] ?? '');

    switch (arg) {
      case '-o':
      case '--onto': {
        const [value, next] = optionValue(args, i, inline, showAddHelp);
        options.onto = value;
        i = next;
        break;
      }
      case '-R':
      case '--as-root':
        options.asRoot = true;
        break;
      case '-f':
      case '--as-first-child':
        options.asFirstChild = true;
        break;
      case '-h':
      case '--help':
        showAddHelp();
        return;
      default:
        if (arg.startsWith('-') || branch !== undefined) {
          usageError(`Unexpected argument: ${arg}`, showAddHelp);
        }
        branch = arg;
    }
  }

  if (options.asRoot && (options.onto || options.asFirstChild)) {
    usageError('Option --as-root cannot be combined with --onto or --as-first-child', showAddHelp);
  }

  await addCommand(flags, branch, options);
}

async function handleDiscoverCommand(flags: RunFlags, args: string[]): Promise<void> {
  const options: DiscoverOptions = {};

  for (let i = 0; i < args.length; i++) {
    const [arg, inline] = splitOption(args[i] ?? '');

    switch (arg) {
      case '-C':
      case '--checked-out-since': {
        const [value, next] = optionValue(args, i, inline, showDiscoverHelp);
        options.checkedOutSince = value;
        i = next;
        break;
      }
      case '-r':
      case '--roots': {
        const [value, next] = optionValue(args, i, inline, showDiscoverHelp);
        options.roots = value.split(',').filter(Boolean);
        i = next;
        break;
      }
      case '-l':
      case '--list-commits':
        options.listCommits = true;
        break;
      case '-h':
      case '--help':
        showDiscoverHelp();
        return;
      default:
        usageError(`Unexpected argument: ${arg}`, showDiscoverHelp);
    }
  }

  await discoverCommand(flags, options);
}

async function handleGoCommand(flags: RunFlags, args: string[]): Promise<void> {
  if (wantsHelp(args)) return showGoHelp();
  const [value, extra] = args;
  const direction = value === undefined ? null : parseDirection(value);
  if (!direction || direction === 'current' || extra !== undefined) {
    usageError(`Expected one direction: up, down, first, last, next, prev or root`, showGoHelp);
  }
  await goCommand(flags, direction);
}

async function handleShowCommand(flags: RunFlags, args: string[]): Promise<void> {
  if (wantsHelp(args)) return showShowHelp();
  const [value, branch, extra] = args;
  const direction = value === undefined ? null : parseDirection(value);
  if (!direction || extra !== undefined) {
    usageError(`Expected a direction: up, down, first, last, next, prev, root or current`, showShowHelp);
  }
  await showCommand(flags, direction, branch);
}

async function handleListCommand(flags: RunFlags, args: string[]): Promise<void> {
  if (wantsHelp(args)) return showListHelp();
  const [category, branch, extra] = args;
  if (category === undefined || !isListCategory(category)) {
    usageError(`Expected a category: ${LIST_CATEGORIES.join(', ')}`, showListHelp);
  }
  if ((category === 'slidable-after') !== (branch !== undefined) || extra !== undefined) {
    usageError('Only slidable-after takes a branch argument, and requires one', showListHelp);
  }
  await listCommand(flags, category, branch);
}

async function handleAnnoCommand(flags: RunFlags, args: string[]): Promise<void> {
  let branch: string | undefined;
  const words: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const [arg, inline] = splitOption(args[i] ?? '');

    switch (arg) {
      case '-b':
      case '--branch': {
        const [value, next] = optionValue(args, i, inline, showAnnoHelp);
        branch = value;
        i = next;
        break;
      }
      case '-h':
      case '--help':
        showAnnoHelp();
        return;
      default:
        words.push(args[i] ?? '');
    }
  }

  await annoCommand(flags, branch, words);
}

function showVersion(): void {
  console.log(`arbor v${VERSION}`);
}

function showHelp(): void {
  console.log(`
${pc.bold('arbor')} - Keep a tree of dependent git branches in sync

${pc.bold('Usage:')}
  arbor <command> [options]

${pc.bold('Commands:')}
  ${pc.cyan('status, s')}          Show the branch tree with sync state
  ${pc.cyan('traverse, t')}        Walk the tree, syncing branches with parents and remotes
  ${pc.cyan('add')}                Add a branch to the tree
  ${pc.cyan('slide-out')}          Remove branches from the tree, rebasing their children
  ${pc.cyan('advance')}            Fast-forward the current branch to its child and slide the child out
  ${pc.cyan('fork-point')}         Show or override the fork point of a branch
  ${pc.cyan('discover')}           Infer the tree from the reflogs
  ${pc.cyan('delete-unmanaged')}   Delete local branches that are not in the tree
  ${pc.cyan('go, g')}              Check out a neighbouring branch
  ${pc.cyan('show')}               Print a neighbouring branch
  ${pc.cyan('list')}               List branches of a category
  ${pc.cyan('is-managed')}         Exit 0 when a branch is in the tree
  ${pc.cyan('anno')}               Show or set a branch annotation
  ${pc.cyan('file')}               Print the branch layout file path

${pc.bold('Global options:')}
  --debug                           Trace every git command
  --verbose                         Echo git commands that change the repository
  -y, --yes                         Answer yes to every question
  --ascii-only                      No colours or box-drawing characters
  --squash-merge-detection=MODE     none, simple (default) or exact
  -h, --help                        Show help
  -v, --version                     Show version

${pc.bold('Examples:')}
  arbor discover                    # Build the tree from recent branches
  arbor status -l                   # Show the tree with commits
  arbor traverse -w                 # Sync the whole tree
  arbor add --onto=develop feat/x   # Add feat/x as a child of develop

${pc.dim('Run')} ${pc.cyan('arbor <command> --help')} ${pc.dim('for more information on a command.')}
`);
}

function showStatusHelp(): void {
  console.log(`
${pc.bold('arbor status')} - Show the branch tree

${pc.bold('Usage:')}
  arbor status [options]

${pc.bold('Options:')}
  -l, --list-commits                List the commits of each branch
  -L, --list-commits-with-hashes    List commits with their short hashes
  -h, --help                        Show help

${pc.bold('Edges:')}
  ${pc.green('green')}   in sync with the parent
  ${pc.yellow('yellow')}  in sync, but the fork point is not the parent's tip
  ${pc.red('red')}     out of sync with the parent
  ${pc.dim('grey')}    merged into the parent
`);
}

function showTraverseHelp(): void {
  console.log(`
${pc.bold('arbor traverse')} - Walk the tree and sync each branch

${pc.bold('Usage:')}
  arbor traverse [options]

${pc.bold('Options:')}
  -F, --fetch                       Fetch remotes first
  -l, --list-commits                List commits in the printed status
  -M, --merge                       Merge the parent instead of rebasing
  -n, --no-edit-merge               Do not open an editor for merge commits
  --no-interactive-rebase           Rebase without -i
  --[no-]push                       Offer pushes of tracked branches
  --[no-]push-untracked             Offer pushes of untracked branches
  --return-to=WHERE                 here, nearest-remaining or stay (default)
  --start-from=WHERE                here (default), root, first-root or a branch
  --stop-after=BRANCH               Stop after visiting BRANCH
  -w, --whole                       Same as --start-from=first-root --return-to=nearest-remaining -n
  -y, --yes                         Answer yes to every question
  -h, --help                        Show help

${pc.bold('Answers:')}
  y  yes    N  no, skip    q  quit    yq  yes, then quit
`);
}

function showForkPointHelp(): void {
  console.log(`
${pc.bold('arbor fork-point')} - Show or override where a branch forks off

${pc.bold('Usage:')}
  arbor fork-point [branch] [option]

${pc.bold('Options:')}
  --inferred                        Show the inferred fork point, ignoring overrides
  --override-to=REVISION            Use REVISION as the fork point
  --override-to-inferred            Pin the currently inferred fork point
  --override-to-parent              Use the parent's tip as the fork point
  --unset-override                  Remove the override
  -h, --help                        Show help
`);
}

function showSlideOutHelp(): void {
  console.log(`
${pc.bold('arbor slide-out')} - Remove branches from the tree

${pc.bold('Usage:')}
  arbor slide-out [options] [branch...]

${pc.bold('Options:')}
  -d, --down-fork-point=REVISION    Fork point for rebasing the child of the last branch
  --delete                          Delete the slid-out branches
  -M, --merge                       Merge the new parent into the children instead of rebasing
  -n, --no-edit-merge               Do not open an editor for merge commits
  --no-interactive-rebase           Rebase without -i
  --removed-from-remote             Slide out childless branches whose remote branch is gone
  -h, --help                        Show help
`);
}

function showAdvanceHelp(): void {
  console.log(`
${pc.bold('arbor advance')} - Fast-forward the current branch to its child, then slide the child out

${pc.bold('Usage:')}
  arbor advance [-y]
`);
}

function showAddHelp(): void {
  console.log(`
${pc.bold('arbor add')} - Add a branch to the tree

${pc.bold('Usage:')}
  arbor add [options] [branch]

${pc.bold('Options:')}
  -o, --onto=BRANCH                 Parent branch (inferred when omitted)
  -R, --as-root                     Add as a new root
  -f, --as-first-child              Put the branch before its siblings
  -y, --yes                         Do not ask for confirmation
  -h, --help                        Show help
`);
}

function showDiscoverHelp(): void {
  console.log(`
${pc.bold('arbor discover')} - Infer the branch tree from the reflogs

${pc.bold('Usage:')}
  arbor discover [options]

${pc.bold('Options:')}
  -C, --checked-out-since=DATE      Only branches checked out since DATE
  -r, --roots=A,B                   Root branches (default master or main, and develop)
  -l, --list-commits                List commits in the printed tree
  -y, --yes                         Save without asking
  -h, --help                        Show help
`);
}

function showDeleteUnmanagedHelp(): void {
  console.log(`
${pc.bold('arbor delete-unmanaged')} - Delete local branches that are not in the tree

${pc.bold('Usage:')}
  arbor delete-unmanaged [-y]
`);
}

function showGoHelp(): void {
  console.log(`
${pc.bold('arbor go')} - Check out a branch relative to the current one

${pc.bold('Usage:')}
  arbor go <up|u|down|d|first|f|last|l|next|n|prev|p|root|r>
`);
}

function showShowHelp(): void {
  console.log(`
${pc.bold('arbor show')} - Print a branch relative to the current (or given) one

${pc.bold('Usage:')}
  arbor show <up|u|down|d|first|f|last|l|next|n|prev|p|root|r|current|c> [branch]
`);
}

function showListHelp(): void {
  console.log(`
${pc.bold('arbor list')} - List branches of a category

${pc.bold('Usage:')}
  arbor list <category> [branch]

${pc.bold('Categories:')}
  ${LIST_CATEGORIES.join(', ')}
`);
}

function showIsManagedHelp(): void {
  console.log(`
${pc.bold('arbor is-managed')} - Exit 0 when the branch is in the tree, 1 otherwise

${pc.bold('Usage:')}
  arbor is-managed [branch]
`);
}

function showAnnoHelp(): void {
  console.log(`
${pc.bold('arbor anno')} - Show or set the annotation of a branch

${pc.bold('Usage:')}
  arbor anno [-b BRANCH] [text...]

Qualifiers rebase=no, push=no, slide-out=no and update=merge in the text
change how traverse treats the branch.
`);
}

function showFileHelp(): void {
  console.log(`
${pc.bold('arbor file')} - Print the path of the branch layout file
`);
}
