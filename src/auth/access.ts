import type { AdminService } from "../admins/adminService.js";
import type { DeviceCatalog } from "../devices/deviceCatalog.js";
import type { ScopeResolver } from "../menu/synchronizer.js";
import type { MenuScope, Role } from "./types.js";

export class AccessService implements ScopeResolver {
  constructor(
    private readonly admins: AdminService,
    private readonly devices: DeviceCatalog,
    private readonly superadmins: readonly number[],
  ) {}

  async getRole(userId: number): Promise<Role> {
    if (this.superadmins.includes(userId)) return "superadmin";
    const record = await this.admins.get(userId);
    if (!record) return "unregistered";
    return record.role;
  }

  isSuperadmin(userId: number): boolean {
    return this.superadmins.includes(userId);
  }

  async accessibleGroups(userId: number): Promise<string[]> {
    const role = await this.getRole(userId);
    if (role === "unregistered") return [];
    const allGroups = await this.devices.listGroups();
    if (role === "superadmin") return allGroups;
    const record = await this.admins.get(userId);
    const own = new Set(record?.groups ?? []);
    return allGroups.filter((group) => own.has(group));
  }

  async canAccessGroup(userId: number, group: string): Promise<boolean> {
    return (await this.accessibleGroups(userId)).includes(group);
  }

  async resolveScope(userId: number): Promise<MenuScope> {
    const [role, groups, allGroups, devicesByGroup] = await Promise.all([
      this.getRole(userId),
      this.accessibleGroups(userId),
      this.devices.listGroups(),
      this.devices.devicesByGroup(),
    ]);
    return { role, groups, allGroups, devicesByGroup };
  }
}
