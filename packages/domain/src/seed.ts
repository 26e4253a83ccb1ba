/**
 * Seed Data
 *
 * Example users, groups, grants and rows for development and demos,
 * read from fixtures/seed.json and validated before anything is written.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import type { Subject } from "@adminforge/contracts";
import { ConfigurationError, type GrantService, type MemoryAdapter } from "@adminforge/platform";

const seedSchema = z.object({
  users: z.array(
    z.object({
      id: z.string().min(1),
      username: z.string().min(1),
      isActive: z.boolean(),
      isStaff: z.boolean(),
      isSuperuser: z.boolean(),
    })
  ),
  groups: z.array(
    z.object({
      name: z.string().min(1),
      members: z.array(z.string()),
      grants: z.array(z.string()),
    })
  ),
  userGrants: z.array(z.object({ userId: z.string(), codename: z.string() })),
  rows: z.record(z.array(z.record(z.unknown()))),
});

export type SeedData = z.infer<typeof seedSchema>;

/** Where seeded users and groups go: the memory or the drizzle store */
export interface SeedDirectory {
  addUser(subject: Subject): void | Promise<void>;
  addGroup(name: string): string | Promise<string>;
  addUserToGroup(userId: string, groupId: string): void | Promise<void>;
}

export interface SeedSummary {
  users: number;
  groups: number;
  grants: number;
  rows: Record<string, number>;
}

export function loadSeedData(
  url: URL = new URL("./fixtures/seed.json", import.meta.url)
): SeedData {
  const parsed = seedSchema.safeParse(JSON.parse(readFileSync(url, "utf8")));
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigurationError(`Invalid seed data:\n  ${problems.join("\n  ")}`);
  }
  return parsed.data;
}

/**
 * Writes seed data. Grants go through GrantService, so the site must be
 * finalized first: codenames naming unknown content types are rejected.
 */
export async function seedDomain(
  data: SeedData,
  adapter: MemoryAdapter,
  directory: SeedDirectory,
  grants: GrantService
): Promise<SeedSummary> {
  let grantCount = 0;

  for (const user of data.users) {
    await directory.addUser(user);
  }
  for (const group of data.groups) {
    const groupId = await directory.addGroup(group.name);
    for (const member of group.members) {
      await directory.addUserToGroup(member, groupId);
    }
    for (const codename of group.grants) {
      await grants.grantToGroup(groupId, codename);
      grantCount++;
    }
  }
  for (const grant of data.userGrants) {
    await grants.grantToUser(grant.userId, grant.codename);
    grantCount++;
  }

  const rows: Record<string, number> = {};
  for (const [model, modelRows] of Object.entries(data.rows)) {
    await adapter.load(model, modelRows);
    rows[model] = modelRows.length;
  }

  return { users: data.users.length, groups: data.groups.length, grants: grantCount, rows };
}
