/**
 * Generated email address owned by exactly one user
 */
export interface Alias {
  id: string;
  userId: string;
  email: string;
  enabled: boolean;
  createdAt: Date;
}

export interface CreateAliasInput {
  userId: string;
  email: string;
}
