import type { RiskReport } from "../risk/riskCalculator.js";

export type TableRow = readonly [string, string];

export interface TextTable {
  readonly title: string;
  readonly header: TableRow;
  /** Row groups; a rule is drawn between consecutive groups. */
  readonly sections: readonly (readonly TableRow[])[];
}

const REPORT_TITLE = "Trade Information";

const currencyFormatter = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatMoney(value: number): string {
  return `$ ${currencyFormatter.format(value)}`;
}

function pad(value: string, width: number): string {
  return value + " ".repeat(Math.max(0, width - value.length));
}

function center(value: string, width: number): string {
  const space = Math.max(0, width - value.length);
  const left = Math.floor(space / 2);
  return " ".repeat(left) + value + " ".repeat(space - left);
}

export function renderTable(table: TextTable): string {
  const rows = [table.header, ...table.sections.flat()];
  const keyWidth = Math.max(...rows.map(([key]) => key.length));
  let valueWidth = Math.max(...rows.map(([, value]) => value.length));
  // "| key | value |" leaves keyWidth + valueWidth + 3 characters between the outer bars
  valueWidth = Math.max(valueWidth, table.title.length - keyWidth - 3);

  const innerWidth = keyWidth + valueWidth + 3;
  const outerRule = `+${"-".repeat(innerWidth + 2)}+`;
  const columnRule = `+${"-".repeat(keyWidth + 2)}+${"-".repeat(valueWidth + 2)}+`;
  const renderRow = ([key, value]: TableRow) => `| ${pad(key, keyWidth)} | ${pad(value, valueWidth)} |`;

  const lines = [outerRule, `| ${center(table.title, innerWidth)} |`, columnRule, renderRow(table.header), columnRule];
  table.sections.forEach((section) => {
    if (section.length === 0) {
      return;
    }
    section.forEach((row) => lines.push(renderRow(row)));
    lines.push(columnRule);
  });
  return lines.join("\n");
}

export function buildReportSections(report: RiskReport): TableRow[][] {
  const trade: TableRow[] = [
    [report.orderType, report.symbol],
    ["Entry", String(report.entryPrice)],
    ["Stop Loss", `${report.stopLossPips} pips`],
    ...report.legs.map((leg, index): TableRow => [`TP ${index + 1}`, `${leg.pips} pips`]),
  ];
  const sizing: TableRow[] = [
    ["Risk Factor", `${report.riskPercent} %`],
    ["Position Size", report.positionSize.toFixed(2)],
  ];
  const account: TableRow[] = [
    ["Current Balance", formatMoney(report.balance)],
    ["Potential Loss", formatMoney(report.potentialLoss)],
  ];
  const profit: TableRow[] = [
    ...report.legs.map((leg, index): TableRow => [`TP ${index + 1} Profit`, formatMoney(leg.profit)]),
    ["Total Profit", formatMoney(report.totalProfit)],
  ];
  return [trade, sizing, account, profit];
}

export function formatRiskReport(report: RiskReport): string {
  return renderTable({
    title: REPORT_TITLE,
    header: ["Key", "Value"],
    sections: buildReportSections(report),
  });
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

/** Monospace block for chat clients that render HTML. */
export function formatRiskReportHtml(report: RiskReport): string {
  return `<pre>${escapeHtml(formatRiskReport(report))}</pre>`;
}
