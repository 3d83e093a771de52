import type { PermissionAction } from "@atrium/protocol";
import type { AuthUser } from "./auth.js";
import { getBusiness } from "../businesses/store.js";
import { getRole } from "../roles/store.js";
import { errors } from "../lib/errors.js";

export type Resource = "businesses" | "categories" | "channels" | "roles";

/**
 * Super admins and the business owner may do anything in a business;
 * everyone else needs a role there that grants `action` on `resource`.
 */
export function hasPermission(
  user: AuthUser,
  businessId: string,
  resource: Resource,
  action: PermissionAction
): boolean {
  if (user.isSuperAdmin) return true;

  const business = getBusiness(businessId);
  if (!business) return false;
  if (business.ownerId === user.id) return true;

  const roleIds = user.roles[businessId] ?? [];
  return roleIds.some((roleId) => {
    const role = getRole(roleId);
    return role?.businessId === businessId && (role.permissions[resource] ?? []).includes(action);
  });
}

export function assertPermission(
  user: AuthUser,
  businessId: string,
  resource: Resource,
  action: PermissionAction
): void {
  if (!getBusiness(businessId)) {
    throw errors.notFound("Business");
  }
  if (!hasPermission(user, businessId, resource, action)) {
    throw errors.forbidden(`Missing ${action} permission on ${resource}`);
  }
}
