export interface BusinessSettings {
  theme: string;
  notifications: boolean;
}

export interface Business {
  id: string;
  name: string;
  ownerId: string;
  settings: BusinessSettings;
  avatar?: string;
  createdAt: string;
  updatedAt: string;
}

export type PermissionAction = "create" | "read" | "update" | "delete";

/** Resource name → allowed actions */
export type PermissionMap = Record<string, PermissionAction[]>;

export interface Role {
  id: string;
  businessId: string;
  name: string;
  permissions: PermissionMap;
  createdAt: string;
  updatedAt: string;
}

export interface ActivityLog {
  id: string;
  userId: string;
  action: string;
  method: string;
  endpoint: string;
  statusCode: number;
  ipAddress: string;
  createdAt: string;
}
