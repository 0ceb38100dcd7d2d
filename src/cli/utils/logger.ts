/**
 * Human-facing CLI output: coloured ✓/✗/⚠/ℹ lines. Everything goes to stderr
 * so that stdout stays free for the YAML of `get-metadata` and the JSON-RPC
 * stream of the server.
 */

const enum AnsiColor {
  Reset = '\u001B[0m',
  Green = '\u001B[32m',
  Red = '\u001B[31m',
  Yellow = '\u001B[33m',
  Cyan = '\u001B[36m',
}

function colorize(symbol: string, message: string, color: AnsiColor): string {
  return `${color}${symbol}${AnsiColor.Reset} ${message}`;
}

export function info(message: string): void {
  console.error(colorize('ℹ', message, AnsiColor.Cyan));
}

export function success(message: string): void {
  console.error(colorize('✓', message, AnsiColor.Green));
}

export function warn(message: string): void {
  console.warn(colorize('⚠', message, AnsiColor.Yellow));
}

export function error(message: string): void {
  console.error(colorize('✗', message, AnsiColor.Red));
}
