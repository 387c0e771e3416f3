export interface Account {
  id: number;
  address: string;
  privateKey: string;
}

export interface ListAccountsInput {
  first: number;
  after?: number | null;
}

export interface CreateAccountInput {
  address: string;
  privateKey: string;
  createdAt?: string;
}
