import type { BackupSuggestion } from "../../src/lib/injury/depth-chart.js";
import type { MonitorCycleResult, PlayerReport } from "../../src/lib/injury/pipeline.js";
import type { InjuryEvent, ReturnEstimate, ReturnWindow } from "../../src/lib/injury/types.js";

export interface InjuryReportContent {
  heading: string;
  summary: string;
  alertRows: string[];
  details: string[][];
  recovered: string[];
}

const SOURCE_LABELS: Record<ReturnEstimate["source"], string> = {
  model: "model",
  news_override: "news",
  status_floor: "status floor",
};

function formatList(values: string[]): string {
  if (values.length === 0) {
    return "";
  }
  if (values.length === 1) {
    return values[0];
  }
  if (values.length === 2) {
    return `${values[0]} and ${values[1]}`;
  }
  return `${values.slice(0, -1).join(", ")}, and ${values[values.length - 1]}`;
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, "\\|");
}

function playerLabel(event: InjuryEvent): string {
  const team = event.team ? `, ${event.team}` : "";
  return `${event.name} (${event.position}${team})`;
}

function formatWindow(estimate: ReturnWindow): string {
  return `${estimate.predictedDays} days (${estimate.confidenceLow}-${estimate.confidenceHigh}), week ${estimate.targetWeek}`;
}

function formatBackup(backup: BackupSuggestion): string {
  const parts = [`${backup.name} (${backup.team} ${backup.slot} #${backup.depth})`];
  if (backup.injuryStatus) {
    parts.push(`also ${backup.injuryStatus}${backup.bodyPart ? ` (${backup.bodyPart})` : ""}`);
  }
  if (backup.ownedBy) {
    parts.push(`rostered by ${backup.ownedBy}`);
  } else if (backup.available) {
    parts.push("available");
  }
  return parts.join(", ");
}

function alertRow(player: PlayerReport): string {
  const { classification, risk, estimate } = player;
  const cells = [
    classification.kind,
    playerLabel(classification.current),
    classification.current.status,
    classification.current.bodyPart,
    `${risk.score.toFixed(1)} ${risk.level}`,
    formatWindow(estimate),
  ];
  return `| ${cells.map(escapeCell).join(" | ")} |`;
}

function detailLines(player: PlayerReport): string[] {
  const { classification, risk, estimate } = player;
  const lines = [`### ${playerLabel(classification.current)}`, ""];
  const transition = classification.previous
    ? `${classification.previous.status} -> ${classification.current.status}`
    : classification.current.status;
  lines.push(`- Status: ${transition} (${classification.current.bodyPart}), first seen ${classification.current.firstSeen}`);
  lines.push(`- Risk: ${risk.score.toFixed(1)} (${risk.level})`);
  for (const reason of risk.reasons) {
    lines.push(`  - ${reason}`);
  }
  if (risk.chronicBodyParts.length > 0) {
    lines.push(`- Chronic: ${formatList(risk.chronicBodyParts)}`);
  }
  lines.push(`- Return: ${formatWindow(estimate)} via ${SOURCE_LABELS[estimate.source]}`);
  if (estimate.overrideReason) {
    lines.push(`  - ${estimate.overrideReason}`);
  }
  if (estimate.modelEstimate) {
    lines.push(`  - Before override: ${formatWindow(estimate.modelEstimate)}`);
  }
  for (const reason of estimate.reasons) {
    lines.push(`  - ${reason}`);
  }
  if (player.backup) {
    lines.push(`- Backup: ${formatBackup(player.backup)}`);
  }
  return lines;
}

export function buildInjuryReportContent(result: MonitorCycleResult): InjuryReportContent {
  const alertCount = result.alerts.length;
  const scope = result.rosterSize === null ? "" : " on the roster";
  const parts = [
    `${result.players.length} injured ${result.players.length === 1 ? "player" : "players"}${scope}`,
    `${alertCount} ${alertCount === 1 ? "alert" : "alerts"}`,
    `${result.recovered.length} recovered`,
  ];
  if (result.skipped > 0) {
    parts.push(`${result.skipped} skipped`);
  }
  return {
    heading: `Injury report: week ${result.currentWeek}`,
    summary: `${formatList(parts)}. Generated ${result.generatedAt}.`,
    alertRows: result.alerts.map(alertRow),
    details: result.players.map(detailLines),
    recovered: result.recovered.map(
      (event) => `- ${playerLabel(event)}: ${event.bodyPart}, back after ${event.daysOut ?? 0} days`,
    ),
  };
}

export function renderInjuryReport(result: MonitorCycleResult): string {
  const content = buildInjuryReportContent(result);
  const lines: string[] = [];
  lines.push(`# ${content.heading}`);
  lines.push("");
  lines.push(content.summary);
  lines.push("");
  lines.push("## Alerts");
  lines.push("");
  if (content.alertRows.length === 0) {
    lines.push("_No new or worsening injuries._");
  } else {
    lines.push("| Change | Player | Status | Injury | Risk | Return |");
    lines.push("| --- | --- | --- | --- | --- | --- |");
    lines.push(...content.alertRows);
  }
  if (content.details.length > 0) {
    lines.push("");
    lines.push("## Players");
    for (const detail of content.details) {
      lines.push("");
      lines.push(...detail);
    }
  }
  if (content.recovered.length > 0) {
    lines.push("");
    lines.push("## Recovered");
    lines.push("");
    lines.push(...content.recovered);
  }
  return `${lines.join("\n")}\n`;
}
