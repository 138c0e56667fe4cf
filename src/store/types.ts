/**
 * Domain vocabularies. The schema keeps these columns free-form; the API
 * and bulk import validate against the lists below.
 */

export const USER_ROLES = ["admin", "manager", "technician", "user"] as const;
export type UserRole = (typeof USER_ROLES)[number];

export const ASSET_STATUSES = ["operating", "maintenance", "stopped", "decommissioned"] as const;
export type AssetStatus = (typeof ASSET_STATUSES)[number];

export const WORK_ORDER_STATUSES = ["open", "in_progress", "on_hold", "closed", "cancelled"] as const;
export type WorkOrderStatus = (typeof WORK_ORDER_STATUSES)[number];

/** Statuses that stamp `closed_at`. */
export const FINAL_WORK_ORDER_STATUSES: readonly string[] = ["closed", "cancelled"];

export function isUserRole(value: string): value is UserRole {
  return (USER_ROLES as readonly string[]).includes(value);
}

export function isAssetStatus(value: string): value is AssetStatus {
  return (ASSET_STATUSES as readonly string[]).includes(value);
}

export function isWorkOrderStatus(value: string): value is WorkOrderStatus {
  return (WORK_ORDER_STATUSES as readonly string[]).includes(value);
}
