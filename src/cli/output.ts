import chalk from 'chalk';
import Table from 'cli-table3';

let jsonMode = false;

export function setJsonOutput(enabled: boolean): void {
  jsonMode = enabled;
}

export function isJsonOutput(): boolean {
  return jsonMode;
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printTable(headers: string[], rows: string[][]): void {
  if (jsonMode) {
    const data = rows.map(row => {
      const obj: Record<string, string> = {};
      headers.forEach((h, i) => { obj[h] = row[i]; });
      return obj;
    });
    printJson(data);
    return;
  }

  const table = new Table({
    head: headers.map(h => chalk.cyan(h)),
    style: { head: [], border: [] },
  });
  table.push(...rows);
  console.log(table.toString());
}

export function printSuccess(msg: string): void {
  if (jsonMode) {
    printJson({ status: 'success', message: msg });
  } else {
    console.log(chalk.green('✓ ') + msg);
  }
}

export function printError(msg: string): void {
  if (jsonMode) {
    printJson({ status: 'error', message: msg });
  } else {
    console.error(chalk.red('✗ ') + msg);
  }
  process.exitCode = 1;
}

export function printInfo(msg: string): void {
  if (jsonMode) {
    printJson({ status: 'info', message: msg });
  } else {
    console.log(chalk.blue('ℹ ') + msg);
  }
}

/** Coloured "used/limit" bar for quota columns */
export function usageBar(used: number, limit: number, width = 12): string {
  if (limit <= 0) return String(used);
  const pct = Math.min(used / limit, 1);
  const filled = Math.round(pct * width);
  const empty = width - filled;
  const color = pct < 0.6 ? chalk.green : pct < 0.85 ? chalk.yellow : chalk.red;
  return color('█'.repeat(filled)) + chalk.gray('░'.repeat(empty)) + ` ${used}/${limit}`;
}

export function activeLabel(active: boolean): string {
  return active ? chalk.green('active') : chalk.gray('disabled');
}
