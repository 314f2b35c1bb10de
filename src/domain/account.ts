/**
 * Account domain model.
 *
 * The account the caller's credentials belong to, with its trust settings
 * toward other environments.
 */

export interface AccountTrust {
  direct_trust: boolean;
  external_trust: boolean;
  trust_all: boolean;
}

export interface Account {
  id: string;
  trust: AccountTrust;
}

/** The account every request to the mock resolves to. */
export function mockAccount(): Account {
  return {
    id: 'acc_123456',
    trust: {
      direct_trust: true,
      external_trust: false,
      trust_all: false,
    },
  };
}
