import { ContractStatus } from '@clm/database';
import {
  CONTRACT_TRANSITIONS,
  EDITABLE_STATUSES,
  OPEN_STATUSES,
  allowedTransitions,
  canTransition,
  isTerminal,
} from './contract-lifecycle';

const { DRAFT, GENERATED, SIGNING, SIGNED, CANCELLED } = ContractStatus;

describe('contract lifecycle', () => {
  it('defines outgoing edges for every status', () => {
    expect(Object.keys(CONTRACT_TRANSITIONS).sort()).toEqual(
      Object.values(ContractStatus).sort(),
    );
  });

  const table: Array<[ContractStatus, ContractStatus[]]> = [
    [DRAFT, [GENERATED, CANCELLED]],
    [GENERATED, [SIGNING, GENERATED, CANCELLED]],
    [SIGNING, [SIGNED, CANCELLED]],
    [SIGNED, []],
    [CANCELLED, []],
  ];

  it.each(table)('allows %s -> %j', (from, expected) => {
    expect(allowedTransitions(from)).toEqual(expected);
  });

  it('rejects skipping a step', () => {
    expect(canTransition(DRAFT, SIGNING)).toBe(false);
    expect(canTransition(GENERATED, SIGNED)).toBe(false);
    expect(canTransition(DRAFT, SIGNED)).toBe(false);
  });

  it('never moves backwards', () => {
    expect(canTransition(SIGNING, GENERATED)).toBe(false);
    expect(canTransition(GENERATED, DRAFT)).toBe(false);
    expect(canTransition(CANCELLED, DRAFT)).toBe(false);
  });

  it('allows re-generation', () => {
    expect(canTransition(GENERATED, GENERATED)).toBe(true);
  });

  it('treats SIGNED and CANCELLED as terminal', () => {
    expect(Object.values(ContractStatus).filter(isTerminal)).toEqual([SIGNED, CANCELLED]);
  });

  it('returns a copy the caller may mutate', () => {
    const states = allowedTransitions(DRAFT);
    states.push(SIGNED);
    expect(canTransition(DRAFT, SIGNED)).toBe(false);
  });

  it('limits content edits to DRAFT and GENERATED and title edits to open statuses', () => {
    expect(EDITABLE_STATUSES).toEqual([DRAFT, GENERATED]);
    expect(OPEN_STATUSES).toEqual([DRAFT, GENERATED, SIGNING]);
  });
});
