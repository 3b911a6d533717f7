/**
 * CLI output helpers with coloured status symbols. Everything goes to
 * stderr; stdout carries only listings.
 */

const enum AnsiColor {
  Reset = '\u001B[0m',
  Green = '\u001B[32m',
  Red = '\u001B[31m',
  Yellow = '\u001B[33m',
  Cyan = '\u001B[36m',
}

function colorize(symbol: string, message: string, color: AnsiColor): string {
  if (!process.stderr.isTTY) return `${symbol} ${message}`;
  return `${color}${symbol}${AnsiColor.Reset} ${message}`;
}

export function info(message: string): void {
  console.error(colorize('ℹ', message, AnsiColor.Cyan));
}

export function success(message: string): void {
  console.error(colorize('✓', message, AnsiColor.Green));
}

export function warn(message: string): void {
  console.error(colorize('⚠', message, AnsiColor.Yellow));
}

export function error(message: string): void {
  console.error(colorize('✗', message, AnsiColor.Red));
}
