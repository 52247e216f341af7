/** Part a party plays in a contract. */
export enum PartyRole {
  HOST = 'HOST',
  GUEST = 'GUEST',
  WITNESS = 'WITNESS',
}
