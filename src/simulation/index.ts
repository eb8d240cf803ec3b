/**
 * Voting Simulation
 *
 * Runs a whole election in-process against a SessionCoordinator: a kiosk
 * holds the key pair, every listed voter encrypts a ballot and commits to
 * proof randomness, the kiosk decrypts the homomorphic sum and each voter
 * answers one challenge.
 *
 * @example
 * ```typescript
 * const result = runVotingSimulation(
 *   [['alice', 'yes'], ['bob', 'no'], ['carol', 'yes']],
 *   { fraudulentVoters: ['carol'] }
 * );
 * // result.outcome === 'YES', result.fraudDetected === true
 * ```
 *
 * @module simulation
 */

import { SessionError } from '../errors.js';
import { silentLogger } from '../logger.js';
import { classifyTally, decrypt, encrypt, generateKeyPair } from '../paillier/index.js';
import { commit, respond } from '../sigma/index.js';
import type { CommitmentPair, ProofWitness } from '../sigma/types.js';
import { SessionCoordinator } from '../session/coordinator.js';
import type { SimulatedVote, SimulationOptions, SimulationResult } from './types.js';

/** Registrant that holds the key and casts no ballot */
export const KIOSK_ID = 'kiosk';

interface SimulatedBallot {
  witness: ProofWitness;
  proof: CommitmentPair;
}

export function runVotingSimulation(
  votes: readonly SimulatedVote[],
  options: SimulationOptions = {}
): SimulationResult {
  const logger = (options.logger ?? silentLogger()).child({ component: 'simulation' });
  const fraudulent = new Set(options.fraudulentVoters ?? []);
  const keyPair = options.keyPair ?? generateKeyPair(options.keyConfig);
  const { publicKey } = keyPair;

  const session = new SessionCoordinator({
    id: options.sessionId,
    description: 'in-process simulation',
    logger,
  });

  session.registerVoter(KIOSK_ID);
  session.publishPublicKey(KIOSK_ID, publicKey);

  // Ballots
  const ballots = new Map<string, SimulatedBallot>();
  for (const [voterId, choice] of votes) {
    session.registerVoter(voterId);

    const value = choice === 'yes' ? 1n : -1n;
    const { ciphertext, randomness } = encrypt(value, publicKey);
    const proof = commit(publicKey);
    session.recordVote(voterId, ciphertext, proof.commitment);

    ballots.set(voterId, { witness: { value, randomness }, proof });
  }
  logger.info({ ballots: ballots.size }, 'ballots cast');

  // Tally
  const { encryptedSum, voteCount } = session.beginTally();
  const tally = decrypt(encryptedSum, keyPair);
  session.recordTallyResult(KIOSK_ID, tally);

  // Proof round
  for (const { voterId, challenge } of session.issueChallenges()) {
    const ballot = ballots.get(voterId);
    if (!ballot) {
      session.expireChallenge(voterId, 'withdrawn');
      continue;
    }

    const witness: ProofWitness = fraudulent.has(voterId)
      ? { value: -ballot.witness.value, randomness: ballot.witness.randomness }
      : ballot.witness;
    const { v, w } = respond(ballot.proof.secret, challenge, witness, publicKey);
    session.recordProofResponse(voterId, { u: ballot.proof.commitment.a, v, w });
  }

  const report = session.getReport();
  if (!report) {
    throw new SessionError('Simulation finished without a verification report', 'NO_REPORT', {
      phase: session.getPhase(),
    });
  }

  const outcome = classifyTally(tally);
  logger.info(
    { outcome, validCount: report.validCount, fraudDetected: report.fraudDetected },
    'simulation finished'
  );

  return {
    sessionId: report.sessionId,
    tally,
    outcome,
    voteCount,
    verifications: report.results,
    validCount: report.validCount,
    fraudDetected: report.fraudDetected,
    auditLogValid: session.verifyAuditLog(),
  };
}

export type { SimulatedVote, SimulationOptions, SimulationResult } from './types.js';
