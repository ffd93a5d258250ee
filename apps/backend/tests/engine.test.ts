/**
 * E. Governance Engine
 * - Full lifecycle: propose → vote → queue → execute
 * - Cancel, veto and their interaction with the timelock
 * - Queue is all-or-nothing
 * - Operations are applied one at a time
 * - Admin parameters and withdraw
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { Hex, ProposalCalls } from '@veto-governor/shared';
import { DEFAULT_GRACE_PERIOD_SECONDS } from '@veto-governor/shared';
import type { TimelockTransaction } from '../src/governance/ports.js';
import { DEFAULT_TIMELOCK_DELAY_SECONDS, MemoryTimelock } from '../src/services/memory/memoryTimelock.js';
import {
  ADMIN,
  ALICE,
  BOB,
  CAROL,
  CUSTODIAN,
  DEFAULT_PARAMS,
  PROPOSER,
  SET_FEE_CALLDATA,
  STRANGER,
  TARGET,
  TIMELOCK,
  VETOER,
  createHarness,
  endVoting,
  eventsOf,
  mintElectorate,
  singleCall,
  thrownCode,
  type Harness,
} from './harness.js';

const OTHER_CALLDATA: Hex = '0x0000000000000000000000000000000000000000000000000000000000000007';
const THIRD_CALLDATA: Hex = '0x0000000000000000000000000000000000000000000000000000000000000008';

function twoCalls(second: Hex = OTHER_CALLDATA): ProposalCalls {
  return {
    targets: [TARGET, TARGET],
    values: [0n, 0n],
    signatures: ['setFee(uint256)', 'setFee(uint256)'],
    calldatas: [SET_FEE_CALLDATA, second],
  };
}

function threeCalls(): ProposalCalls {
  return {
    targets: [TARGET, TARGET, TARGET],
    values: [0n, 0n, 0n],
    signatures: ['setFee(uint256)', 'setFee(uint256)', 'setFee(uint256)'],
    calldatas: [SET_FEE_CALLDATA, OTHER_CALLDATA, THIRD_CALLDATA],
  };
}

/** Refuses the Nth queue or cancel call it receives. */
class FlakyTimelock extends MemoryTimelock {
  failQueueOn = 0;
  failCancelOn = 0;
  private queueCalls = 0;
  private cancelCalls = 0;

  override async queueTransaction(tx: TimelockTransaction): Promise<Hex> {
    this.queueCalls += 1;
    if (this.queueCalls === this.failQueueOn) throw new Error('queue refused');
    return super.queueTransaction(tx);
  }

  override async cancelTransaction(tx: TimelockTransaction): Promise<void> {
    this.cancelCalls += 1;
    if (this.cancelCalls === this.failCancelOn) throw new Error('rpc');
    return super.cancelTransaction(tx);
  }
}

function flakyHarness(failures: { queueOn?: number; cancelOn?: number }): Harness {
  const flaky = createHarness({
    executor: (clock, ledger) => {
      const timelock = new FlakyTimelock(clock, ledger, { address: TIMELOCK });
      timelock.failQueueOn = failures.queueOn ?? 0;
      timelock.failCancelOn = failures.cancelOn ?? 0;
      return timelock;
    },
  });
  mintElectorate(flaky);
  return flaky;
}

/** Propose, let alice and carol vote For (70 of 100), and close voting. */
async function passProposal(h: Harness, calls: ProposalCalls = singleCall()): Promise<number> {
  const id = await h.engine.propose(PROPOSER, calls, 'Set fee');
  h.clock.mine(2n);
  await h.engine.castVote(ALICE, id, 1);
  await h.engine.castVote(CAROL, id, 1);
  await endVoting(h, id);
  return id;
}

let h: Harness;
beforeEach(() => {
  h = createHarness();
  mintElectorate(h);
});

describe('E. Governance Engine', () => {
  describe('lifecycle', () => {
    it('runs a proposal from creation to execution', async () => {
      const id = await h.engine.propose(PROPOSER, singleCall(), 'Set fee to 42');
      expect(id).toBe(1);
      expect(await h.engine.state(id)).toBe('Pending');
      await expect(h.engine.castVote(ALICE, id, 1)).rejects.toMatchObject({ code: 'VotingClosed' });

      h.clock.mine(2n);
      expect(await h.engine.state(id)).toBe('Active');
      expect(await h.engine.castVote(ALICE, id, 1, 'yes')).toBe(30n);
      expect(await h.engine.castVote(BOB, id, 0)).toBe(20n);

      await endVoting(h, id);
      expect(await h.engine.state(id)).toBe('Succeeded');
      expect(h.engine.quorumVotes(id)).toBe(30n);

      const expectedEta = h.clock.currentTime + DEFAULT_TIMELOCK_DELAY_SECONDS;
      expect(await h.engine.queue(id)).toBe(expectedEta);
      expect(await h.engine.state(id)).toBe('Queued');
      expect(h.timelock.queuedCount()).toBe(1);

      await expect(h.engine.execute(id)).rejects.toMatchObject({ code: 'InvalidTransition' });

      h.clock.increaseTime(DEFAULT_TIMELOCK_DELAY_SECONDS);
      await h.engine.execute(id);
      expect(await h.engine.state(id)).toBe('Executed');
      expect(h.timelock.executed.map((tx) => tx.target)).toEqual([TARGET]);
      expect(h.timelock.queuedCount()).toBe(0);

      expect(h.events.map((e) => e.type)).toEqual([
        'ProposalCreated',
        'VoteCast',
        'VoteCast',
        'ProposalQueued',
        'ProposalExecuted',
      ]);
      expect(eventsOf(h.events, 'ProposalQueued')).toEqual([{ type: 'ProposalQueued', id, eta: expectedEta }]);
    });

    it('announces the voting window, threshold and base quorum on creation', async () => {
      const id = await h.engine.propose(PROPOSER, singleCall(), 'Set fee to 42');
      expect(eventsOf(h.events, 'ProposalCreated')).toEqual([
        {
          type: 'ProposalCreated',
          id,
          proposer: PROPOSER,
          actions: h.engine.getActions(id),
          startBlock: 3n,
          endBlock: 5763n,
          proposalThreshold: 0n,
          quorumVotes: 10n,
          description: 'Set fee to 42',
        },
      ]);
    });

    it('reports the full proposal view', async () => {
      const id = await h.engine.propose(PROPOSER, singleCall(), 'Set fee');
      h.clock.mine(2n);
      await h.engine.castVote(BOB, id, 0);
      await h.engine.castVote(CAROL, id, 2);

      const view = await h.engine.proposal(id);
      expect(view).toMatchObject({
        id,
        proposer: PROPOSER,
        creationBlock: 2n,
        totalSupply: 100n,
        forVotes: 0n,
        againstVotes: 20n,
        abstainVotes: 40n,
        quorumVotes: 30n,
        state: 'Active',
        eta: 0n,
      });
      expect(h.engine.getReceipt(id, CAROL)).toEqual({ hasVoted: true, support: 2, votes: 40n });
    });

    it('moves value from the timelock on execution', async () => {
      h.ledger.fund(TIMELOCK, 5n);
      const id = await passProposal(h, singleCall(5n));
      await h.engine.queue(id);
      h.clock.increaseTime(DEFAULT_TIMELOCK_DELAY_SECONDS);
      await h.engine.execute(id);
      expect(h.ledger.balanceSync(TARGET)).toBe(5n);
      expect(h.ledger.balanceSync(TIMELOCK)).toBe(0n);
    });

    it('expires a queued proposal after the grace period', async () => {
      const id = await passProposal(h);
      await h.engine.queue(id);
      h.clock.increaseTime(DEFAULT_TIMELOCK_DELAY_SECONDS + DEFAULT_GRACE_PERIOD_SECONDS - 1n);
      expect(await h.engine.state(id)).toBe('Queued');
      h.clock.increaseTime(1n);
      expect(await h.engine.state(id)).toBe('Expired');
      await expect(h.engine.execute(id)).rejects.toMatchObject({ code: 'InvalidTransition' });
    });

    it('defeats a proposal the majority voted against', async () => {
      const id = await h.engine.propose(PROPOSER, singleCall(), 'Set fee');
      h.clock.mine(2n);
      await h.engine.castVote(BOB, id, 0);
      await endVoting(h, id);
      expect(await h.engine.state(id)).toBe('Defeated');
      await expect(h.engine.queue(id)).rejects.toMatchObject({ code: 'InvalidTransition' });
    });
  });

  describe('propose', () => {
    it('requires weight above the threshold at the previous block', async () => {
      await expect(h.engine.propose(STRANGER, singleCall(), 'x')).rejects.toMatchObject({ code: 'BelowThreshold' });
      h.token.mint(STRANGER, 50n);
      await expect(h.engine.propose(STRANGER, singleCall(), 'x')).rejects.toMatchObject({ code: 'BelowThreshold' });
      h.clock.mine();
      expect(await h.engine.propose(STRANGER, singleCall(), 'x')).toBe(1);
    });

    it('rejects mismatched actions without creating anything', async () => {
      const calls: ProposalCalls = { ...singleCall(), signatures: [] };
      await expect(h.engine.propose(PROPOSER, calls, 'x')).rejects.toMatchObject({ code: 'ActionsMismatch' });
      expect(h.engine.proposalCount()).toBe(0);
      expect(h.events).toEqual([]);
    });

    it('allows one live proposal per proposer', async () => {
      const first = await h.engine.propose(PROPOSER, singleCall(), 'first');
      await expect(h.engine.propose(PROPOSER, singleCall(), 'second')).rejects.toMatchObject({
        code: 'InvalidTransition',
      });
      await endVoting(h, first);
      expect(await h.engine.state(first)).toBe('Defeated');
      expect(await h.engine.propose(PROPOSER, singleCall(), 'second')).toBe(2);
    });
  });

  describe('castVote', () => {
    it('weighs votes at the creation block', async () => {
      const id = await h.engine.propose(PROPOSER, singleCall(), 'Set fee');
      h.clock.mine();
      h.token.transfer(ALICE, BOB, 30n);
      h.clock.mine();
      expect(await h.engine.castVote(ALICE, id, 1)).toBe(30n);
      expect(await h.engine.castVote(BOB, id, 0)).toBe(20n);
    });

    it('rejects an invalid support value', async () => {
      const id = await h.engine.propose(PROPOSER, singleCall(), 'Set fee');
      h.clock.mine(2n);
      await expect(h.engine.castVote(ALICE, id, 5)).rejects.toMatchObject({ code: 'InvalidSupport' });
      expect(h.engine.getReceipt(id, ALICE).hasVoted).toBe(false);
    });

    it('fails for an unknown proposal', async () => {
      await expect(h.engine.castVote(ALICE, 9, 1)).rejects.toMatchObject({ code: 'UnknownProposal' });
      expect(thrownCode(() => h.engine.getReceipt(9, ALICE))).toBe('UnknownProposal');
    });
  });

  describe('serialization', () => {
    it('applies concurrent votes one at a time', async () => {
      const id = await h.engine.propose(PROPOSER, singleCall(), 'Set fee');
      h.clock.mine(2n);
      await Promise.all([h.engine.castVote(ALICE, id, 1), h.engine.castVote(CAROL, id, 1)]);
      expect((await h.engine.proposal(id)).forVotes).toBe(70n);
    });

    it('lets exactly one of two racing votes by the same voter through', async () => {
      const id = await h.engine.propose(PROPOSER, singleCall(), 'Set fee');
      h.clock.mine(2n);
      const results = await Promise.allSettled([h.engine.castVote(ALICE, id, 1), h.engine.castVote(ALICE, id, 0)]);
      expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected']);
      const tally = await h.engine.proposal(id);
      expect([tally.forVotes, tally.againstVotes]).toEqual([30n, 0n]);
    });

    it('keeps running after a failed operation', async () => {
      await expect(h.engine.propose(STRANGER, singleCall(), 'x')).rejects.toMatchObject({ code: 'BelowThreshold' });
      expect(await h.engine.propose(PROPOSER, singleCall(), 'x')).toBe(1);
    });
  });

  describe('cancel', () => {
    it('opens to anyone once the proposer falls to the threshold', async () => {
      const small = createHarness();
      small.token.mint(PROPOSER, 2n);
      small.token.mint(ALICE, 9_998n);
      small.clock.mine();

      // threshold = 1 bps of 10 000 = 1
      const id = await small.engine.propose(PROPOSER, singleCall(), 'Set fee');
      await expect(small.engine.cancel(STRANGER, id)).rejects.toMatchObject({ code: 'ProposerAboveThreshold' });
      expect(await small.engine.state(id)).toBe('Pending');

      small.token.transfer(PROPOSER, ALICE, 1n);
      await small.engine.cancel(STRANGER, id);
      expect(await small.engine.state(id)).toBe('Canceled');
      expect(eventsOf(small.events, 'ProposalCanceled')).toEqual([{ type: 'ProposalCanceled', id }]);
    });

    it('pulls queued actions out of the timelock', async () => {
      const id = await passProposal(h);
      await h.engine.queue(id);
      await h.engine.cancel(PROPOSER, id);
      expect(h.timelock.queuedCount()).toBe(0);
      expect(await h.engine.state(id)).toBe('Canceled');
    });

    it('reports a refused timelock cancel and can be retried', async () => {
      const flaky = flakyHarness({ cancelOn: 2 });
      const id = await passProposal(flaky, twoCalls());
      await flaky.engine.queue(id);

      await expect(flaky.engine.cancel(PROPOSER, id)).rejects.toMatchObject({
        code: 'ExecutorRejected',
        message: `ExecutorRejected: could not cancel queued actions (setFee(uint256) on ${TARGET}: rpc)`,
      });
      expect(await flaky.engine.state(id)).toBe('Queued');
      expect(flaky.timelock.queuedCount()).toBe(1);
      expect(eventsOf(flaky.events, 'ProposalCanceled')).toEqual([]);

      await flaky.engine.cancel(PROPOSER, id);
      expect(await flaky.engine.state(id)).toBe('Canceled');
      expect(flaky.timelock.queuedCount()).toBe(0);
    });

    it('cannot cancel an executed proposal', async () => {
      const id = await passProposal(h);
      await h.engine.queue(id);
      h.clock.increaseTime(DEFAULT_TIMELOCK_DELAY_SECONDS);
      await h.engine.execute(id);
      await expect(h.engine.cancel(PROPOSER, id)).rejects.toMatchObject({ code: 'AlreadyFinal' });
    });
  });

  describe('veto', () => {
    it('vetoes a pending proposal', async () => {
      const id = await h.engine.propose(PROPOSER, singleCall(), 'Set fee');
      await h.engine.veto(VETOER, id);
      expect(await h.engine.state(id)).toBe('Vetoed');
      expect(eventsOf(h.events, 'ProposalVetoed')).toEqual([{ type: 'ProposalVetoed', id }]);
    });

    it('is refused to anyone but the vetoer, before looking up the proposal', async () => {
      await expect(h.engine.veto(STRANGER, 9)).rejects.toMatchObject({ code: 'VetoerOnly' });
      await expect(h.engine.veto(VETOER, 9)).rejects.toMatchObject({ code: 'UnknownProposal' });
    });

    it('pulls queued actions out of the timelock', async () => {
      const id = await passProposal(h);
      await h.engine.queue(id);
      await h.engine.veto(VETOER, id);
      expect(h.timelock.queuedCount()).toBe(0);
      expect(await h.engine.state(id)).toBe('Vetoed');
    });

    it('leaves the proposal Queued when the timelock refuses a cancel', async () => {
      const flaky = flakyHarness({ cancelOn: 2 });
      const id = await passProposal(flaky, twoCalls());
      await flaky.engine.queue(id);

      await expect(flaky.engine.veto(VETOER, id)).rejects.toMatchObject({ code: 'ExecutorRejected', proposalId: id });
      expect(await flaky.engine.state(id)).toBe('Queued');
      expect(eventsOf(flaky.events, 'ProposalVetoed')).toEqual([]);
    });

    it('cannot veto an executed proposal', async () => {
      const id = await passProposal(h);
      await h.engine.queue(id);
      h.clock.increaseTime(DEFAULT_TIMELOCK_DELAY_SECONDS);
      await h.engine.execute(id);
      await expect(h.engine.veto(VETOER, id)).rejects.toMatchObject({ code: 'CannotVetoExecuted' });
    });

    it('stops working once veto power is burned', async () => {
      const id = await h.engine.propose(PROPOSER, singleCall(), 'Set fee');
      await h.engine.burnVetoPower(VETOER);
      await expect(h.engine.veto(VETOER, id)).rejects.toMatchObject({ code: 'VetoPowerBurned' });
      expect(await h.engine.state(id)).toBe('Pending');
    });

    it('follows the vetoer handoff', async () => {
      const id = await h.engine.propose(PROPOSER, singleCall(), 'Set fee');
      await h.engine.setPendingVetoer(VETOER, ALICE);
      await h.engine.acceptVetoer(ALICE);
      await expect(h.engine.veto(VETOER, id)).rejects.toMatchObject({ code: 'VetoerOnly' });
      await h.engine.veto(ALICE, id);
      expect(await h.engine.state(id)).toBe('Vetoed');
    });
  });

  describe('queue', () => {
    it('rolls back what it queued when the timelock refuses an action', async () => {
      const flaky = flakyHarness({ queueOn: 2 });
      const id = await passProposal(flaky, twoCalls());

      await expect(flaky.engine.queue(id)).rejects.toMatchObject({ code: 'ExecutorRejected' });
      expect(flaky.timelock.queuedCount()).toBe(0);
      expect(await flaky.engine.state(id)).toBe('Succeeded');
      expect(eventsOf(flaky.events, 'ProposalQueued')).toEqual([]);

      await flaky.engine.queue(id);
      expect(flaky.timelock.queuedCount()).toBe(2);
      expect(await flaky.engine.state(id)).toBe('Queued');
    });

    it('keeps rolling back past a refused cancel and reports both failures', async () => {
      const flaky = flakyHarness({ queueOn: 3, cancelOn: 1 });
      const id = await passProposal(flaky, threeCalls());

      const err = await flaky.engine.queue(id).catch((e: unknown) => e);
      expect(err).toMatchObject({ code: 'ExecutorRejected', proposalId: id });
      expect(err).toHaveProperty(
        'message',
        `ExecutorRejected: queue refused; rollback failed for setFee(uint256) on ${TARGET}: rpc`,
      );
      expect(flaky.timelock.queuedCount()).toBe(1);
      expect(await flaky.engine.state(id)).toBe('Succeeded');
    });

    it('refuses identical actions in one proposal', async () => {
      const id = await passProposal(h, twoCalls(SET_FEE_CALLDATA));
      await expect(h.engine.queue(id)).rejects.toMatchObject({ code: 'ActionAlreadyQueued' });
      expect(h.timelock.queuedCount()).toBe(0);
    });
  });

  describe('execute', () => {
    it('leaves the proposal Queued when an action reverts', async () => {
      const id = await passProposal(h);
      await h.engine.queue(id);
      h.clock.increaseTime(DEFAULT_TIMELOCK_DELAY_SECONDS);
      h.timelock.revertCallsTo(TARGET);
      await expect(h.engine.execute(id)).rejects.toMatchObject({ code: 'ExecutorRejected' });
      expect(await h.engine.state(id)).toBe('Queued');
      expect(eventsOf(h.events, 'ProposalExecuted')).toEqual([]);
    });
  });

  describe('admin parameters', () => {
    it('rejects invalid parameters at construction', () => {
      expect(thrownCode(() => createHarness({ params: { ...DEFAULT_PARAMS, votingPeriod: 1n } }))).toBe(
        'InvalidParameter',
      );
    });

    it('checks the caller before the value', async () => {
      await expect(h.engine.setVotingDelay(STRANGER, 0n)).rejects.toMatchObject({ code: 'AdminOnly' });
      await expect(h.engine.setVotingDelay(ADMIN, 0n)).rejects.toMatchObject({ code: 'InvalidParameter' });
      await expect(h.engine.setVotingPeriod(ADMIN, 100n)).rejects.toMatchObject({ code: 'InvalidParameter' });
      await expect(h.engine.setProposalThresholdBPS(ADMIN, 1001)).rejects.toMatchObject({ code: 'InvalidParameter' });
      expect(h.engine.parameters()).toEqual(DEFAULT_PARAMS);
    });

    it('applies a new voting delay to later proposals', async () => {
      await h.engine.setVotingDelay(ADMIN, 10n);
      expect(eventsOf(h.events, 'VotingDelaySet')).toEqual([
        { type: 'VotingDelaySet', oldVotingDelay: 1n, newVotingDelay: 10n },
      ]);
      const id = await h.engine.propose(PROPOSER, singleCall(), 'Set fee');
      expect((await h.engine.proposal(id)).startBlock).toBe(12n);
    });

    it('keeps the quorum parameters a proposal was created with', async () => {
      const first = await h.engine.propose(PROPOSER, singleCall(), 'first');
      await h.engine.setDynamicQuorumParams(ADMIN, {
        minQuorumVotesBPS: 2000,
        maxQuorumVotesBPS: 4000,
        quorumCoefficient: 0,
      });
      const second = await h.engine.propose(ALICE, singleCall(), 'second');
      expect(h.engine.quorumVotes(first)).toBe(10n);
      expect(h.engine.quorumVotes(second)).toBe(20n);
    });

    it('applies several changes together or not at all', async () => {
      await expect(
        h.engine.updateParameters(ADMIN, { votingDelay: 10n, proposalThresholdBPS: 5000 }),
      ).rejects.toMatchObject({ code: 'InvalidParameter' });
      expect(h.engine.parameters()).toEqual(DEFAULT_PARAMS);
      expect(h.events).toEqual([]);

      expect(await h.engine.updateParameters(ADMIN, { votingDelay: 10n, proposalThresholdBPS: 500 })).toEqual({
        ...DEFAULT_PARAMS,
        votingDelay: 10n,
        proposalThresholdBPS: 500,
      });
      expect(h.events.map((e) => e.type)).toEqual(['VotingDelaySet', 'ProposalThresholdBPSSet']);
    });

    it('reports the current proposal threshold', async () => {
      await h.engine.setProposalThresholdBPS(ADMIN, 1000);
      expect(await h.engine.proposalThreshold()).toBe(10n);
      await expect(h.engine.propose(PROPOSER, singleCall(), 'x')).rejects.toMatchObject({ code: 'BelowThreshold' });
    });
  });

  describe('withdraw', () => {
    beforeEach(() => {
      h.ledger.fund(CUSTODIAN, 100n);
    });

    it('sends the custodian balance to the admin', async () => {
      expect(await h.engine.withdraw(ADMIN)).toEqual({ amount: 100n, sent: true });
      expect(h.ledger.balanceSync(ADMIN)).toBe(100n);
      expect(eventsOf(h.events, 'Withdraw')).toEqual([{ type: 'Withdraw', amount: 100n, sent: true }]);
    });

    it('reports a refused transfer', async () => {
      h.ledger.rejectFunds(ADMIN);
      expect(await h.engine.withdraw(ADMIN)).toEqual({ amount: 100n, sent: false });
      expect(h.ledger.balanceSync(CUSTODIAN)).toBe(100n);
      expect(eventsOf(h.events, 'Withdraw')).toEqual([{ type: 'Withdraw', amount: 100n, sent: false }]);
    });

    it('is admin-only', async () => {
      await expect(h.engine.withdraw(STRANGER)).rejects.toMatchObject({ code: 'AdminOnly' });
      expect(h.ledger.balanceSync(CUSTODIAN)).toBe(100n);
      expect(h.events).toEqual([]);
    });

    it('pays whoever holds the admin role after a handoff', async () => {
      await h.engine.setPendingAdmin(ADMIN, BOB);
      await h.engine.acceptAdmin(BOB);
      await expect(h.engine.withdraw(ADMIN)).rejects.toMatchObject({ code: 'AdminOnly' });
      expect(await h.engine.withdraw(BOB)).toEqual({ amount: 100n, sent: true });
      expect(h.ledger.balanceSync(BOB)).toBe(100n);
    });
  });
});
