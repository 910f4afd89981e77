/**
 * Live execution logger for specrun.
 *
 * All output goes to stderr so stdout stays clean for JSON contract output.
 * Emoji prefixes give instant visual context in the terminal.
 */

import type { Phase } from '../schema/index.js';

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  process.stderr.write(message + '\n');
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function section(title: string): void {
  write(`\n${'─'.repeat(50)}`);
  write(`▶  ${title}`);
  write(`${'─'.repeat(50)}`);
}

export function scenario(index: number, total: number, name: string): void {
  write(`📋 [${String(index + 1)}/${String(total)}] ${name}`);
}

export function stepResult(
  phase: Phase,
  success: boolean,
  description: string,
): void {
  const icon = success ? '✅' : '❌';
  write(`${icon} ${phase.toUpperCase().padEnd(5)} ${description}`);
}

export function browser(message: string): void {
  write(`🌐 ${message}`);
}

export function retry(message: string): void {
  write(`🔁 ${message}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}
