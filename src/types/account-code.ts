export type AccountCodePurpose = 'activation' | 'reset_password';

/**
 * One-time code mailed to a user for activation or password reset
 */
export interface AccountCode {
  id: string;
  userId: string;
  purpose: AccountCodePurpose;
  code: string;
  expiresAt: Date;
  createdAt: Date;
}

export interface CreateAccountCodeInput {
  userId: string;
  purpose: AccountCodePurpose;
  code: string;
  expiresAt: Date;
}
