import { isUserRole, type UserRole } from "../store/types.js";

const RANK: Record<UserRole, number> = {
  user: 1,
  technician: 2,
  manager: 3,
  admin: 4,
};

/** True when `role` is `minimum` or above. Unknown roles satisfy nothing. */
export function hasRole(role: string, minimum: UserRole): boolean {
  const rank = isUserRole(role) ? RANK[role] : 0;
  return rank >= RANK[minimum];
}
