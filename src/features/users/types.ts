export type UserRole = 'staff' | 'manager' | 'admin';

export interface UserProfile {
  uid: string;
  name: string;
  email: string | null;
  branchId: string | null;
  branchName: string | null;
  role: UserRole;
  photoUrl: string | null;
}

export interface IdentityDirectory {
  currentUserId(): string | null;
  /** Throws UserNotFound when `users/{uid}` is missing. */
  getUserProfile(uid: string): Promise<UserProfile>;
}

export interface UserFilters {
  branchId?: string | null;
}

export interface UserDirectory {
  listUsers(filters?: UserFilters): Promise<UserProfile[]>;
}

export interface SignUpInput {
  name: string;
  email: string;
  password: string;
  branchId: string;
}
