import Table from 'cli-table3';
import chalk from 'chalk';
import type { CirculationStatus, Party } from '../../core/ports';

// Print formatted table using cli-table3 with cyan headers
export function printTable(headers: string[], rows: string[][]): void {
  const table = new Table({
    head: headers.map((h) => chalk.cyan(h)),
    style: { head: [], border: [] },
  });

  rows.forEach((row) => table.push(row));
  console.log(table.toString());
}

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

// Errors go to stderr
export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

export function formatDate(date: Date | null | undefined): string {
  if (!date) return '-';
  return date.toLocaleString();
}

// "Name (id)", or "-" for an empty slot
export function formatParty(party: Party | undefined): string {
  if (!party) return '-';
  return party.name === party.id ? party.id : `${party.name} (${party.id})`;
}

// Circulation status with color coding
export function formatStatus(status: CirculationStatus): string {
  const colors: Record<CirculationStatus, typeof chalk.green> = {
    Available: chalk.green,
    Borrowed: chalk.yellow,
    Reserved: chalk.magenta,
  };
  return colors[status](status);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
