import { setTimeout as sleep } from 'node:timers/promises';
import type { ConsoleColor, ConsoleHost, IConsole } from '@conpane/core';

const COLORS: ConsoleColor[] = ['black', 'red', 'green', 'yellow', 'blue', 'magenta', 'cyan', 'white', 'gray'];

const HELP = [
  'Commands:',
  '  help              show this list',
  '  echo <text>       print text',
  '  history           list earlier commands',
  '  width             print the console width in columns',
  '  colors            print every console colour',
  '  progress [steps]  run a fake operation with progress',
  '  clear             clear the console',
  '  exit              quit',
];

export interface DemoHostOptions {
  prompt?: string;
  /** Delay between progress steps, in milliseconds. */
  stepDelay?: number;
  onExit?: () => void;
}

type Command = (args: string, console: IConsole) => Promise<void>;

/** A small command host for trying the console out in a terminal. */
export class DemoHost implements ConsoleHost {
  readonly name = 'demo';
  readonly prompt: string;
  private stepDelay: number;
  private onExit: (() => void) | undefined;
  private commands: Map<string, Command>;

  constructor(options: DemoHostOptions = {}) {
    this.prompt = options.prompt ?? 'PM> ';
    this.stepDelay = options.stepDelay ?? 200;
    this.onExit = options.onExit;
    this.commands = new Map<string, Command>([
      ['help', (_args, console) => this.help(console)],
      ['echo', (args, console) => console.writeLine(args)],
      ['history', (_args, console) => this.history(console)],
      ['width', async (_args, console) => console.writeLine(`${await console.consoleWidth} columns`)],
      ['colors', (_args, console) => this.colors(console)],
      ['progress', (args, console) => this.progress(args, console)],
      ['clear', (_args, console) => console.clear()],
      ['exit', async () => this.onExit?.()],
    ]);
  }

  async initialize(console: IConsole): Promise<void> {
    await console.writeLine('conpane demo console. Type "help" for a list of commands.');
  }

  async execute(command: string, console: IConsole): Promise<boolean> {
    const line = command.trim();
    if (!line) return true;

    const space = line.indexOf(' ');
    const name = space < 0 ? line : line.slice(0, space);
    const args = space < 0 ? '' : line.slice(space + 1).trim();

    const handler = this.commands.get(name);
    if (!handler) {
      await console.write(`${name}: command not found`, 'red');
      await console.writeLine('');
      return false;
    }
    await handler(args, console);
    return true;
  }

  private async help(console: IConsole): Promise<void> {
    for (const line of HELP) {
      await console.writeLine(line);
    }
  }

  private async history(console: IConsole): Promise<void> {
    const entries = await console.getHistory();
    for (const [index, entry] of entries.entries()) {
      await console.writeLine(`${String(index + 1).padStart(4)}  ${entry}`);
    }
  }

  private async colors(console: IConsole): Promise<void> {
    for (const color of COLORS) {
      await console.write(color, color);
      await console.write(' ');
    }
    await console.writeLine('');
  }

  private async progress(args: string, console: IConsole): Promise<void> {
    const steps = args ? Number.parseInt(args, 10) : 5;
    if (!Number.isInteger(steps) || steps <= 0) {
      throw new Error(`progress: invalid step count "${args}"`);
    }
    for (let step = 1; step <= steps; step++) {
      await sleep(this.stepDelay);
      await console.writeProgress('Working', (step * 100) / steps);
      await console.writeLine(`step ${step}/${steps}`);
    }
    await console.writeLine('done');
  }
}
