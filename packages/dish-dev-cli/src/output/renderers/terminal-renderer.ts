/**
 * Terminal Renderer
 *
 * Writes command echoes, status lines and help text to the terminal
 */

import chalk from 'chalk';
import type { OutputRenderer, OutputStream, RenderOptions } from '../../types/output.js';

export interface TerminalRendererOptions {
  stdout?: OutputStream;
  stderr?: OutputStream;
  colors?: boolean;
  quiet?: boolean;
}

export class TerminalRenderer implements OutputRenderer {
  private readonly stdout: OutputStream;
  private readonly stderr: OutputStream;
  private readonly palette: chalk.Chalk;
  private readonly quiet: boolean;

  constructor(options: TerminalRendererOptions = {}) {
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
    this.quiet = options.quiet ?? false;

    // NO_COLOR is handled by the caller, which knows the environment
    this.palette = new chalk.Instance({ level: options.colors === false ? 0 : chalk.level });
  }

  /**
   * Render one line of content
   */
  render(content: string, options?: RenderOptions): void {
    let output = content;

    if (options?.color) {
      output = this.palette[options.color](output);
    }
    if (options?.bold) {
      output = this.palette.bold(output);
    }
    if (options?.dim) {
      output = this.palette.dim(output);
    }

    const stream = options?.stream === 'stderr' ? this.stderr : this.stdout;
    stream.write(`${output}\n`);
  }

  /**
   * Echo an external command line before it runs
   */
  commandLine(line: string, options?: { force?: boolean }): void {
    if (this.quiet && !options?.force) return;
    this.render(line, { dim: true });
  }

  /**
   * Print the lines a command reports after it succeeded
   */
  status(lines: string[]): void {
    if (this.quiet) return;

    lines.forEach((line, index) => {
      // First line is the headline (✅ ...), the rest are addresses
      this.render(line, index === 0 ? { color: 'green', bold: true } : {});
    });
  }

  error(message: string): void {
    this.render(message, { stream: 'stderr' });
  }

  /**
   * Palette matching this renderer's color setting, for callers that format their own text
   */
  get colors(): chalk.Chalk {
    return this.palette;
  }
}
