import chalk from "chalk";

export const ui = {
  brand: chalk.hex("#2F9E5B"),
  success: chalk.green,
  error: chalk.red,
  warn: chalk.yellow,
  dim: chalk.dim,
  bold: chalk.bold,
  label: chalk.cyan,
  value: chalk.white,
  muted: chalk.gray,
  header: chalk.bold.hex("#2F9E5B"),
};

export function banner(): string {
  return `${ui.header("vecmend")} ${ui.dim("index metadata reconciliation")}`;
}

export function formatLabel(label: string, value: string): string {
  return ui.label(`${label}:`) + " " + ui.value(value);
}

export function formatError(text: string): string {
  return ui.error("error") + " " + text;
}
