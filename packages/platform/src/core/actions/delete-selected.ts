/**
 * Built-in "delete selected" action.
 *
 * Deletes row by row so that canDeleteObject() can veto individual rows
 * and one failing row does not abort the rest. There is no rollback: rows
 * deleted before a failure stay deleted, and the outcome says how many.
 */

import type { ActionItemError, PrimaryKey } from "@adminforge/contracts";
import { defineAdminAction } from "./types.js";

function asPk(value: unknown): PrimaryKey | null {
  return typeof value === "string" || typeof value === "number" ? value : null;
}

export const deleteSelectedAction = defineAdminAction({
  name: "delete_selected",
  label: "Delete selected",
  description: "Permanently delete the selected rows.",
  paramsSchema: {},
  scopeKinds: ["ids", "query"],
  isDestructive: true,
  requiredPerm: "delete",

  async execute({ queryset, subject, descriptor, logger }) {
    const rows = await queryset.fetch();
    const errors: ActionItemError[] = [];
    let affected = 0;
    let skipped = 0;

    for (const row of rows) {
      const pk = asPk(row[descriptor.pk]);
      if (pk === null) {
        skipped++;
        errors.push({ pk: null, error: "Row has no primary key" });
        continue;
      }
      if (!(await descriptor.canDeleteObject(row, subject))) {
        skipped++;
        errors.push({ pk, error: "Not allowed to delete this object" });
        continue;
      }
      try {
        affected += await queryset
          .filter([{ field: descriptor.pk, op: "eq", value: pk }])
          .delete();
      } catch (error) {
        const message = error instanceof Error ? error.message : "Unknown error";
        logger.warn("Row delete failed", { pk, error: message });
        errors.push({ pk, error: message });
      }
    }

    return { affected, skipped, errors };
  },
});
