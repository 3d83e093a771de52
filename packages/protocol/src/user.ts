/** Business id → role ids held in that business; `system` holds global roles */
export type UserRoles = Record<string, string[]>;

/** Public user record; the password hash never leaves the server */
export interface User {
  id: string;
  username: string;
  email: string;
  avatar?: string;
  isActive: boolean;
  roles: UserRoles;
  businessIds: string[];
  createdAt: string;
  updatedAt: string;
}

export interface AuthResult {
  token: string;
  user: User;
}
