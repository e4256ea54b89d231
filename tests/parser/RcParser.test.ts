/**
 * Unit tests for RcParser
 */

import { RcParser } from '../../src/services/RcParser';
import { RcCommandType } from '../../src/types/rc';

describe('RcParser', () => {
    let parser: RcParser;

    beforeEach(() => {
        parser = new RcParser();
    });

    describe('Basic Parsing', () => {
        it('should parse empty content', () => {
            const result = parser.parse('');
            expect(result.commands).toHaveLength(0);
            expect(result.errors).toHaveLength(0);
        });

        it('should skip empty lines and comment lines', () => {
            const result = parser.parse('\n\n" a comment\n   " indented comment\n');
            expect(result.commands).toHaveLength(0);
        });

        it('should parse nmap command', () => {
            const result = parser.parse('nmap j gj');
            expect(result.commands).toEqual([
                { type: RcCommandType.NMAP, args: ['j', 'gj'], lineNumber: 1, raw: 'nmap j gj' },
            ]);
        });

        it('should number lines across CRLF input', () => {
            const result = parser.parse('nmap a b\r\n\r\ninoremap jk <Esc>');
            expect(result.commands.map((c) => [c.type, c.lineNumber])).toEqual([
                [RcCommandType.NMAP, 1],
                [RcCommandType.INOREMAP, 3],
            ]);
        });

        it('should match command names case-insensitively', () => {
            expect(parser.parse('NNoremap Y y$').commands[0].type).toBe(RcCommandType.NNOREMAP);
        });

        it('should strip inline comments', () => {
            const result = parser.parse('nmap Y y$ " yank to end');
            expect(result.commands[0].args).toEqual(['Y', 'y$']);
        });
    });

    describe('Unknown commands', () => {
        it('should warn and keep the command', () => {
            const result = parser.parse('set number');

            expect(result.commands[0].type).toBe(RcCommandType.UNKNOWN);
            expect(result.warnings).toEqual([
                { lineNumber: 1, message: 'Unknown command: set', raw: 'set number' },
            ]);
        });
    });

    describe('let and <leader>', () => {
        it('should store a double-quoted value', () => {
            parser.parse('let mapleader = ","');
            expect(parser.getVariable('mapleader')).toBe(',');
        });

        it('should store single-quoted and bare values', () => {
            parser.parse("let mapleader=';'\nlet maplocalleader = _");
            expect(parser.getVariable('mapleader')).toBe(';');
            expect(parser.getVariable('maplocalleader')).toBe('_');
        });

        it('should substitute the leader after it is set', () => {
            const result = parser.parse('let mapleader = ","\nnmap <leader>w :w<CR>');
            expect(result.commands[1].args).toEqual([',w', ':w<CR>']);
        });

        it('should substitute a space leader as notation', () => {
            const result = parser.parse('let mapleader = " "\nnmap <Leader>f x');
            expect(parser.getVariable('mapleader')).toBe(' ');
            expect(result.commands[1].args).toEqual(['<Space>f', 'x']);
        });

        it('should leave <leader> alone until a leader is set', () => {
            const result = parser.parse('nmap <leader>w :w<CR>');
            expect(result.commands[0].args).toEqual(['<leader>w', ':w<CR>']);
        });

        it('should record an invalid assignment as an error', () => {
            const result = parser.parse('let = 3');

            expect(result.commands).toHaveLength(0);
            expect(result.errors).toEqual([
                { lineNumber: 1, message: 'Invalid assignment: = 3', raw: 'let = 3' },
            ]);
        });

        it('should forget variables on clearVariables', () => {
            parser.setVariable('mapleader', ',');
            parser.clearVariables();
            expect(parser.getVariable('mapleader')).toBeUndefined();
        });
    });

    describe('getSummary', () => {
        it('should summarize commands, warnings and errors', () => {
            const result = parser.parse('nmap a b\nset nu\nlet = 1');
            expect(parser.getSummary(result)).toBe('Parsed 1 command(s), 1 warning(s), 1 error(s)');
        });

        it('should omit empty counts', () => {
            expect(parser.getSummary(parser.parse('nmap a b'))).toBe('Parsed 1 command(s)');
        });
    });
});
