import { CALENDAR_WEEK, type DateWindow } from "@authorscope/core";
import { formatCountRecord, type ContributionReport } from "./domain.js";

const describeWindow = (window: DateWindow): string => {
  if (window.startDate === null && window.endDate === null) {
    return "all history";
  }

  return `${window.startDate ?? "first commit"} to ${window.endDate ?? "latest commit"}`;
};

const renderPullRequests = (report: ContributionReport): string[] => {
  const { pullRequests } = report;
  const lines = [
    "Pull Requests",
    `  identity: ${pullRequests.identity}`,
    `  count: ${pullRequests.count}`,
    `  source: ${pullRequests.source ?? "none"}`,
  ];

  if (pullRequests.remediation.length > 0) {
    lines.push("  remediation:");
    for (const hint of pullRequests.remediation) {
      lines.push(`    - ${hint}`);
    }
  }

  return lines;
};

export const renderTextReport = (report: ContributionReport): string => {
  const { metrics } = report;
  const lines: string[] = [];

  lines.push("Summary");
  lines.push(`  author: ${report.author}`);
  lines.push(`  repository: ${report.repository.name} (${report.repository.rootPath})`);
  lines.push(`  dateWindow: ${describeWindow(report.dateWindow)}`);
  lines.push(`  activityScore: ${metrics.activityScore}`);
  lines.push(`  generatedAt: ${report.generatedAt}`);

  lines.push("");
  lines.push(...renderPullRequests(report));

  lines.push("");
  lines.push("Commit Statistics");
  lines.push(`  totalCommits: ${metrics.totalCommits}`);
  lines.push(`  uniqueCommits: ${metrics.uniqueCommits}`);
  lines.push(`  recentCommits30d: ${metrics.recentCommits30d}`);
  lines.push(`  branchBreakdown: ${formatCountRecord(metrics.branchBreakdown)}`);

  lines.push("");
  lines.push("Lines of Code");
  lines.push(`  filesModified: ${metrics.filesModified}`);
  lines.push(`  totalLoc: ${metrics.totalLoc}`);
  lines.push(`  linesAdded: ${metrics.linesAdded}`);
  lines.push(`  linesDeleted: ${metrics.linesDeleted}`);
  lines.push(`  netLines: ${metrics.netLines}`);
  lines.push(`  locByExtension: ${formatCountRecord(metrics.locByExtension)}`);
  if (metrics.largestFiles.length === 0) {
    lines.push("  largestFiles: none");
  } else {
    lines.push("  largestFiles:");
    for (const file of metrics.largestFiles) {
      lines.push(`    - ${file.filePath} | lines=${file.lines}`);
    }
  }

  const weekdays: Record<string, number> = {};
  for (const weekday of CALENDAR_WEEK) {
    const count = metrics.weekdayBreakdown[weekday];
    if (count !== undefined) {
      weekdays[weekday] = count;
    }
  }

  lines.push("");
  lines.push("Timeline");
  lines.push(`  firstCommitDate: ${metrics.firstCommitDate ?? "n/a"}`);
  lines.push(`  lastCommitDate: ${metrics.lastCommitDate ?? "n/a"}`);
  lines.push(`  daysActive: ${metrics.daysActive ?? "n/a"}`);
  lines.push(
    `  mostActiveWeekday: ${
      metrics.mostActiveWeekday === null
        ? "none"
        : `${metrics.mostActiveWeekday.weekday} (${metrics.mostActiveWeekday.commits} commits)`
    }`,
  );
  lines.push(`  yearlyBreakdown: ${formatCountRecord(metrics.yearlyBreakdown)}`);
  lines.push(`  monthlyBreakdown: ${formatCountRecord(metrics.monthlyBreakdown)}`);
  lines.push(`  weekdayBreakdown: ${formatCountRecord(weekdays)}`);

  return lines.join("\n");
};
