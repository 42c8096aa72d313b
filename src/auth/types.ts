export type Role = "unregistered" | "admin" | "superadmin";

/** What a user may see; everything the default controls are derived from. */
export interface MenuScope {
  role: Role;
  groups: string[];
  allGroups: string[];
  devicesByGroup: Record<string, string[]>;
}
