import { describe, it, expect } from "vitest";
import { formatCategoryLine } from "./interactive";

describe("formatCategoryLine", () => {
  it("says when a category has no changes", () => {
    expect(
      formatCategoryLine({ key: "JIRA", label: "Jira issues", newCount: 0, changedCount: 0, unchangedCount: 7 }),
    ).toBe("Jira issues: no changes");
  });

  it("lists new, updated and unchanged counts", () => {
    expect(
      formatCategoryLine({ key: "CONFLUENCE", label: "Confluence pages", newCount: 2, changedCount: 1, unchangedCount: 4 }),
    ).toBe("Confluence pages: 2 new, 1 updated, 4 unchanged");
  });

  it("omits zero counts", () => {
    expect(
      formatCategoryLine({ key: "JIRA", label: "Jira issues", newCount: 0, changedCount: 3, unchangedCount: 0 }),
    ).toBe("Jira issues: 3 updated");
  });
});
