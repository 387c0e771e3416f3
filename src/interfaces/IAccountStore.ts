import {Account, ListAccountsInput} from "../types/account.types";

/**
 * Read-only, ordered view of the wallet table.
 * Pages are keyset-paged on ascending id so a cursor can resume after any id.
 */
export interface IAccountStore {
  listPage(input: ListAccountsInput): Account[];
}
