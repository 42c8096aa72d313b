import type { JsonStore } from "../store/jsonStore.js";
import type { AdminRecord, AdminRole } from "../store/types.js";

const now = () => new Date().toISOString();

export interface NewAdmin {
  name: string;
  position: string;
  groups: string[];
  role?: AdminRole;
}

export class AdminService {
  constructor(private readonly store: JsonStore) {}

  async get(telegramUserId: number): Promise<AdminRecord | null> {
    const admins = await this.store.read("admins");
    return admins.find((admin) => admin.telegramUserId === telegramUserId) ?? null;
  }

  /** Creates or replaces the record of a user. */
  async register(telegramUserId: number, data: NewAdmin): Promise<AdminRecord> {
    const record: AdminRecord = {
      telegramUserId,
      name: data.name,
      position: data.position,
      groups: [...data.groups],
      role: data.role ?? "admin",
      createdAt: now(),
    };
    await this.store.update("admins", (admins) => [
      ...admins.filter((admin) => admin.telegramUserId !== telegramUserId),
      record,
    ]);
    return record;
  }

  async list(): Promise<AdminRecord[]> {
    const admins = await this.store.read("admins");
    return admins.sort((a, b) => a.name.localeCompare(b.name));
  }
}
