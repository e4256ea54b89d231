/**
 * RcParser - rc-style configuration parser
 *
 * Turns configuration text into ParsedCommands, one per non-empty line.
 * Lines starting with `"` are comments; a `"` after whitespace starts an
 * inline comment unless it opens the quoted value of a `let`.
 *
 * @module services/RcParser
 */

import type { IRcParser } from '../types/services';
import {
  RcCommandType,
  type ParsedCommand,
  type ParseResult,
  type ParseError,
  type ParseWarning,
} from '../types/rc';
import { getLogger } from './Logger';

const log = getLogger('parser');

/** Commands recognized by name */
const COMMAND_NAMES: ReadonlyMap<string, RcCommandType> = new Map(
  Object.values(RcCommandType)
    .filter((type) => type !== RcCommandType.COMMENT && type !== RcCommandType.UNKNOWN)
    .map((type) => [type, type])
);

/** Notation for leader values that cannot appear bare in a key sequence */
const LEADER_NOTATION: Record<string, string> = {
  ' ': '<Space>',
  '<': '<lt>',
  '\\': '<Bslash>',
  '|': '<Bar>',
};

/**
 * Parser for rc configuration text
 */
export class RcParser implements IRcParser {
  private variables: Map<string, string> = new Map();

  /**
   * Parse rc content
   */
  parse(content: string): ParseResult {
    const commands: ParsedCommand[] = [];
    const errors: ParseError[] = [];
    const warnings: ParseWarning[] = [];

    const lines = content.split(/\r?\n/);

    for (let i = 0; i < lines.length; i++) {
      const lineNumber = i + 1;
      const line = lines[i].trim();

      if (line.length === 0 || line.startsWith('"')) {
        continue;
      }

      try {
        const command = this.parseLine(line, lineNumber);
        if (command.type === RcCommandType.COMMENT) {
          continue;
        }
        if (command.type === RcCommandType.UNKNOWN) {
          warnings.push({
            lineNumber,
            message: `Unknown command: ${line.split(/\s+/)[0]}`,
            raw: line,
          });
        } else if (command.type === RcCommandType.LET) {
          this.processLetCommand(command);
        }
        commands.push(command);
      } catch (error) {
        errors.push({
          lineNumber,
          message: error instanceof Error ? error.message : String(error),
          raw: line,
        });
      }
    }

    log.debug(`Parsed ${commands.length} commands, ${errors.length} errors, ${warnings.length} warnings`);
    return { commands, errors, warnings };
  }

  /**
   * Get summary of parse results
   */
  getSummary(result: ParseResult): string {
    const successCount = result.commands.filter((c) => c.type !== RcCommandType.UNKNOWN).length;
    const warningCount = result.warnings.length;
    const errorCount = result.errors.length;

    let summary = `Parsed ${successCount} command(s)`;
    if (warningCount > 0) {
      summary += `, ${warningCount} warning(s)`;
    }
    if (errorCount > 0) {
      summary += `, ${errorCount} error(s)`;
    }
    return summary;
  }

  setVariable(name: string, value: string): void {
    this.variables.set(name, value);
  }

  getVariable(name: string): string | undefined {
    return this.variables.get(name);
  }

  clearVariables(): void {
    this.variables.clear();
  }

  private parseLine(line: string, lineNumber: number): ParsedCommand {
    const cleanLine = this.removeInlineComment(line);

    if (cleanLine.length === 0) {
      return { type: RcCommandType.COMMENT, args: [], lineNumber, raw: line };
    }

    const [command, ...args] = cleanLine.split(/\s+/);
    const type = COMMAND_NAMES.get(command.toLowerCase()) ?? RcCommandType.UNKNOWN;

    return {
      type,
      args: type === RcCommandType.LET ? args : args.map((arg) => this.substituteVariables(arg)),
      lineNumber,
      raw: line,
    };
  }

  /**
   * Strip an inline comment; quotes opened right after `=` are kept
   */
  private removeInlineComment(line: string): string {
    let quoteChar = '';

    for (let i = 0; i < line.length; i++) {
      const char = line[i];

      if (quoteChar !== '') {
        if (char === quoteChar) {
          quoteChar = '';
        }
        continue;
      }

      if ((char === '"' || char === "'") && line.substring(0, i).trim().endsWith('=')) {
        quoteChar = char;
        continue;
      }

      const prevChar = i > 0 ? line[i - 1] : '';
      if (char === '"' && (prevChar === ' ' || prevChar === '\t')) {
        return line.substring(0, i).trim();
      }
    }

    return line.trim();
  }

  /**
   * Replace `<leader>` once a leader was set with `let mapleader`
   */
  private substituteVariables(text: string): string {
    const leader = this.variables.get('mapleader');
    if (leader === undefined) {
      return text;
    }
    const notation = LEADER_NOTATION[leader] ?? leader;
    return text.replace(/<leader>/gi, () => notation);
  }

  /**
   * Handles `let name = "value"`, `let name='value'` and `let name = value`
   */
  private processLetCommand(command: ParsedCommand): void {
    const assignment = command.args.join(' ');
    const match =
      assignment.match(/^(\w+)\s*=\s*"(.*)"$/) ??
      assignment.match(/^(\w+)\s*=\s*'(.*)'$/) ??
      assignment.match(/^(\w+)\s*=\s*(\S+)$/);

    if (!match) {
      throw new SyntaxError(`Invalid assignment: ${assignment}`);
    }
    this.variables.set(match[1], match[2]);
    log.debug(`let ${match[1]} = ${JSON.stringify(match[2])}`);
  }
}
