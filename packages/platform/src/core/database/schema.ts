/**
 * RBAC Tables
 *
 * Drizzle definitions of the tables runAdminMigrations() creates.
 * A null content_type_id on a grant addresses the global namespace.
 */

import { boolean, pgTable, primaryKey, text, timestamp } from "drizzle-orm/pg-core";

export const adminContentTypes = pgTable("admin_content_types", {
  id: text("id").primaryKey(),
  appLabel: text("app_label").notNull(),
  modelSlug: text("model_slug").notNull(),
  dottedName: text("dotted_name").notNull(),
  isVirtual: boolean("is_virtual").notNull().default(false),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});

export const adminUsers = pgTable("admin_users", {
  id: text("id").primaryKey(),
  username: text("username").notNull().unique(),
  isActive: boolean("is_active").notNull().default(true),
  isStaff: boolean("is_staff").notNull().default(false),
  isSuperuser: boolean("is_superuser").notNull().default(false),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});

export const adminGroups = pgTable("admin_groups", {
  id: text("id").primaryKey(),
  name: text("name").notNull().unique(),
});

export const adminUserGroups = pgTable(
  "admin_user_groups",
  {
    userId: text("user_id").notNull().references(() => adminUsers.id, { onDelete: "cascade" }),
    groupId: text("group_id").notNull().references(() => adminGroups.id, { onDelete: "cascade" }),
  },
  (t) => ({ pk: primaryKey({ columns: [t.userId, t.groupId] }) })
);

export const adminUserPermissions = pgTable("admin_user_permissions", {
  userId: text("user_id").notNull().references(() => adminUsers.id, { onDelete: "cascade" }),
  contentTypeId: text("content_type_id").references(() => adminContentTypes.id, { onDelete: "cascade" }),
  action: text("action").notNull(),
});

export const adminGroupPermissions = pgTable("admin_group_permissions", {
  groupId: text("group_id").notNull().references(() => adminGroups.id, { onDelete: "cascade" }),
  contentTypeId: text("content_type_id").references(() => adminContentTypes.id, { onDelete: "cascade" }),
  action: text("action").notNull(),
});
