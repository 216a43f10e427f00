import * as p from "@clack/prompts";
import { previewSync, type SyncPreview } from "@/sync";
import { ConfigError, errorMessage } from "@/sync/errors";
import { runExclusive } from "@/sync/runner";
import type { ChangeSet } from "@/sync/ledger/types";
import type { RunReport, SourceType } from "@/sync/types";

interface CategoryInfo {
  key: SourceType;
  label: string;
  newCount: number;
  changedCount: number;
  unchangedCount: number;
}

function getCategoryInfo(preview: SyncPreview): CategoryInfo[] {
  return [
    { key: "JIRA", label: "Jira issues", ...counts(preview.JIRA) },
    { key: "CONFLUENCE", label: "Confluence pages", ...counts(preview.CONFLUENCE) },
  ];
}

function counts(cs: ChangeSet<unknown>) {
  return { newCount: cs.new.length, changedCount: cs.changed.length, unchangedCount: cs.unchanged.length };
}

export function formatCategoryLine(cat: CategoryInfo): string {
  const total = cat.newCount + cat.changedCount;
  if (total === 0) return `${cat.label}: no changes`;
  const parts: string[] = [];
  if (cat.newCount > 0) parts.push(`${cat.newCount} new`);
  if (cat.changedCount > 0) parts.push(`${cat.changedCount} updated`);
  if (cat.unchangedCount > 0) parts.push(`${cat.unchangedCount} unchanged`);
  return `${cat.label}: ${parts.join(", ")}`;
}

function showBreakdown(report: RunReport, categories: CategoryInfo[], selected: SourceType[]): void {
  for (const key of selected) {
    const cat = categories.find((c) => c.key === key);
    if (!cat) continue;
    const results = report.results.filter((r) => r.sourceType === key);
    const synced = results.filter((r) => r.action === "synced").length;
    const failed = results.filter((r) => r.action === "failed").length;
    const parts: string[] = [];
    if (synced > 0) parts.push(`${synced} synced`);
    if (failed > 0) parts.push(`${failed} failed`);
    if (parts.length > 0) {
      p.log.message(`  ${cat.label}: ${parts.join(", ")}`);
    }
  }
}

export async function runInteractiveSync(): Promise<void> {
  p.intro("Knowledge Sync");

  const fetchSpinner = p.spinner();
  fetchSpinner.start("Checking Jira and Confluence for updates...");

  let preview: SyncPreview;
  try {
    preview = await previewSync();
    fetchSpinner.stop("Sources checked.");
  } catch (error) {
    fetchSpinner.stop("Could not check for updates.");
    if (error instanceof ConfigError) {
      p.log.error("Configuration problems:");
      for (const issue of error.issues) {
        p.log.message(`  ${issue.setting}: ${issue.detail}`);
      }
      p.outro("Fix your .env file and try again.");
      return;
    }
    p.log.error(errorMessage(error));
    p.outro("Sync could not start. Check your settings and try again.");
    return;
  }

  const categories = getCategoryInfo(preview);
  const withChanges = categories.filter((c) => c.newCount + c.changedCount > 0);

  if (withChanges.length === 0) {
    p.log.success("Everything is up to date!");
    p.outro("Nothing to sync.");
    return;
  }

  p.log.info("Changes detected:");
  for (const cat of categories) {
    p.log.message(`  ${formatCategoryLine(cat)}`);
  }

  const selected = await p.multiselect({
    message: "What would you like to sync?",
    options: withChanges.map((cat) => ({
      value: cat.key,
      label: `${cat.label} (${cat.newCount + cat.changedCount} items)`,
    })),
    initialValues: withChanges.map((c) => c.key),
  });

  if (p.isCancel(selected)) {
    p.outro("Sync cancelled.");
    return;
  }

  const syncSpinner = p.spinner();
  syncSpinner.start("Syncing...");

  let report: RunReport;
  try {
    report = await runExclusive({ sourceTypes: selected });
  } catch (error) {
    syncSpinner.stop("Sync failed.");
    p.log.error(errorMessage(error));
    p.outro("Done.");
    return;
  }
  syncSpinner.stop("Sync finished.");

  if (report.status === "error") {
    p.log.error(report.error ?? report.message);
  } else if (report.failed > 0) {
    p.log.warn(`${report.synced} synced, ${report.failed} failed. Check the log for details.`);
  } else if (report.synced > 0) {
    p.log.success(`${report.synced} items synced successfully.`);
  } else {
    p.log.info("No items were synced.");
  }

  showBreakdown(report, categories, selected);
  p.outro("Done!");
}
