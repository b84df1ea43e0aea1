import type {
  Alert,
  MultipleUsernamesAlert,
  Report,
  ThresholdAlert,
  TimeWindowAlert,
} from "./types";
import { formatTimestamp } from "./rule-engine/utils";
import {
  ALERT_KIND_LABELS,
  MAX_USERNAMES_SHOWN,
  REPORT_WIDTH,
} from "@/lib/constants";

export type ReportFormat = "text" | "json";

function section(title: string): string {
  return `=== ${title} ===`;
}

function renderTimeWindowAlert(alert: TimeWindowAlert): string[] {
  return [
    `  IP: ${alert.ip}`,
    `     Failed Attempts: ${alert.metric} in ${alert.detail.windowMinutes} minutes`,
    `     Window Start: ${formatTimestamp(alert.detail.windowStart)}`,
  ];
}

function renderMultipleUsernamesAlert(alert: MultipleUsernamesAlert): string[] {
  const { usernames } = alert.detail;
  const lines = [
    `  IP: ${alert.ip}`,
    `     Unique Usernames Attempted: ${alert.metric}`,
    `     Usernames: ${usernames.slice(0, MAX_USERNAMES_SHOWN).join(", ")}`,
  ];
  if (usernames.length > MAX_USERNAMES_SHOWN) {
    lines.push(`     ... and ${usernames.length - MAX_USERNAMES_SHOWN} more`);
  }
  return lines;
}

function renderThresholdAlert(alert: ThresholdAlert): string[] {
  return [`  IP: ${alert.ip}`, `     Failed Attempts: ${alert.metric}`];
}

function renderAlert(alert: Alert): string[] {
  switch (alert.kind) {
    case "TIME_WINDOW_BRUTE_FORCE":
      return renderTimeWindowAlert(alert);
    case "MULTIPLE_USERNAMES":
      return renderMultipleUsernamesAlert(alert);
    case "THRESHOLD_BRUTE_FORCE":
      return renderThresholdAlert(alert);
  }
}

/**
 * Format a report as console text.
 *
 * Alert sections follow the order alerts appear in the report, one section
 * per kind; kinds without alerts are left out.
 */
export function renderReport(report: Report): string {
  const rule = "=".repeat(REPORT_WIDTH);
  const lines: string[] = [
    rule,
    "Log Security Analysis Report",
    rule,
    `Generated: ${formatTimestamp(Date.parse(report.generatedAt))} UTC`,
    `Log File: ${report.sourcePath}`,
    `Total Entries Analyzed: ${report.totalEntries}`,
  ];

  if (report.timeRange) {
    lines.push(
      `Time Range: ${formatTimestamp(report.timeRange.start)} - ${formatTimestamp(report.timeRange.end)}`
    );
  }
  lines.push("");

  const timeWindow = report.alerts.filter(
    (a): a is TimeWindowAlert => a.kind === "TIME_WINDOW_BRUTE_FORCE"
  );
  const usernames = report.alerts.filter((a) => a.kind === "MULTIPLE_USERNAMES");
  const threshold = report.alerts.filter((a) => a.kind === "THRESHOLD_BRUTE_FORCE");

  lines.push(section("Security Summary"));
  lines.push(`Failed Login Attempts: ${report.failedLoginCount}`);
  lines.push(`Potential Brute Force Attacks: ${threshold.length}`);
  if (timeWindow.length > 0) {
    lines.push(
      `Time-Window Attacks (${timeWindow[0].detail.windowMinutes} min): ${timeWindow.length}`
    );
  }
  if (usernames.length > 0) {
    lines.push(`Multiple Username Attempts: ${usernames.length}`);
  }
  lines.push("");

  if (report.failedLoginsByIp.length > 0) {
    lines.push(section("Failed Logins by IP"));
    for (const { ip, count } of report.failedLoginsByIp) {
      lines.push(`  ${ip}: ${count} failed attempts`);
    }
    lines.push("");
  }

  let currentKind: Alert["kind"] | null = null;
  for (const alert of report.alerts) {
    if (alert.kind !== currentKind) {
      if (currentKind !== null) lines.push("");
      lines.push(section(ALERT_KIND_LABELS[alert.kind]));
      currentKind = alert.kind;
    }
    lines.push(...renderAlert(alert));
  }
  if (currentKind !== null) {
    lines.push("");
  } else {
    lines.push(section("Security Status"));
    lines.push("No brute force attacks detected");
    lines.push("");
  }

  lines.push(rule);
  return lines.join("\n");
}

/**
 * Format a report as pretty-printed JSON. Epoch timestamps become ISO strings.
 */
export function renderReportJson(report: Report): string {
  const toIso = (ts: number) => new Date(ts).toISOString();
  return JSON.stringify(
    {
      ...report,
      timeRange: report.timeRange
        ? { start: toIso(report.timeRange.start), end: toIso(report.timeRange.end) }
        : null,
      alerts: report.alerts.map((alert) =>
        alert.kind === "TIME_WINDOW_BRUTE_FORCE"
          ? { ...alert, detail: { ...alert.detail, windowStart: toIso(alert.detail.windowStart) } }
          : alert
      ),
    },
    null,
    2
  );
}

export function formatReport(report: Report, format: ReportFormat): string {
  return format === "json" ? renderReportJson(report) : renderReport(report);
}
