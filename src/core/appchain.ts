import type { Felt } from "../types/brands";
import { type ILogger, makeLogger } from "../logging";
import { decodeProgramOutput } from "../codec/programOutput";
import type { StateStore } from "../store/types";
import { MemoryStateStore } from "../store/memoryStore";
import type {
  AppchainSnapshot,
  DecodeOptions,
  ProgramInfo,
  RollingState,
  StateUpdated,
  ValidationPolicy,
} from "./types";
import * as access from "./access";
import { applyStateUpdate, DEFAULT_VALIDATION_POLICY, makeRollingState } from "./state";
import { assertProgramMatches, EMPTY_PROGRAM_INFO } from "./programConfig";
import { EMPTY_LEDGER, messageCount, recordMessages } from "./messaging";
import { computeFact } from "./hash";
import type { FactsRegistry } from "./facts";
import { fail, isAppchainError } from "./errors";
import { feltToHex } from "./felt";

export type StateUpdateListener = (ev: StateUpdated) => void;

export type AppchainOptions = {
  /* deployment arguments; ignored when the store already holds a snapshot */
  owner: Felt;
  stateRoot: Felt;
  blockNumber: Felt;
  blockHash: Felt;

  store?: StateStore;
  facts?: FactsRegistry;
  policy?: Partial<ValidationPolicy>;
  decode?: Partial<DecodeOptions>;
  logger?: ILogger;
};

/**
 * Appchain core: rolling state, access control, program configuration and
 * message ledger, wired explicitly over one store. Every mutating call reads
 * the snapshot, computes the next one and saves it once; a throw anywhere
 * before the save leaves the store untouched.
 */
export class Appchain {
  private readonly store: StateStore;
  private readonly policy: ValidationPolicy;
  private readonly decode: Partial<DecodeOptions>;
  private readonly log: ILogger;
  private facts: FactsRegistry | undefined;
  private listeners: StateUpdateListener[] = [];

  constructor(opts: AppchainOptions) {
    this.store = opts.store ?? new MemoryStateStore();
    this.policy = { ...DEFAULT_VALIDATION_POLICY, ...opts.policy };
    this.decode = opts.decode ?? {};
    this.log = opts.logger ?? makeLogger();
    this.facts = opts.facts;

    if (this.store.load()) {
      this.log.info({ state: this.describe(this.snapshot().state) }, "resumed");
      return;
    }
    this.store.save({
      state: makeRollingState(opts.stateRoot, opts.blockNumber, opts.blockHash),
      access: { owner: opts.owner, operators: [] },
      program: EMPTY_PROGRAM_INFO,
      messages: EMPTY_LEDGER,
    });
  }

  /* ──────────── rolling state ──────────── */

  getState(): RollingState {
    return { ...this.snapshot().state };
  }

  initialize(caller: Felt, stateRoot: Felt, blockNumber: Felt, blockHash: Felt) {
    const s = this.snapshot();
    access.assertOwner(s.access, caller);
    const state = makeRollingState(stateRoot, blockNumber, blockHash);
    this.store.save({ ...s, state });
    this.log.info({ state: this.describe(state) }, "initialized");
  }

  /**
   * Validate a raw program output against the stored state and commit it.
   * Order: caller, fact, decode, program config, state transition, messages.
   */
  updateState(caller: Felt, programOutput: readonly Felt[]): StateUpdated {
    const s = this.snapshot();
    let next: AppchainSnapshot;
    let ev: StateUpdated;
    try {
      access.assertOwnerOrOperator(s.access, caller);
      this.verifyFact(s.program, programOutput);

      const out = decodeProgramOutput(programOutput, this.decode);
      this.log.debug(
        {
          newBlockNumber: feltToHex(out.newBlockNumber),
          toStarknet: out.messagesToStarknet.length,
          toAppchain: out.messagesToAppchain.length,
        },
        "decoded output",
      );
      assertProgramMatches(s.program, out);

      const state = applyStateUpdate(s.state, out, this.policy);
      const { ledger, toStarknet, toAppchain } = recordMessages(s.messages, out);
      next = { ...s, state, messages: ledger };
      ev = {
        ...state,
        messagesToStarknet: toStarknet,
        messagesToAppchain: toAppchain,
      };
    } catch (err) {
      if (isAppchainError(err))
        this.log.warn({ code: err.code, details: err.details }, "update rejected");
      throw err;
    }

    this.store.save(next);
    this.log.info(
      {
        ...this.describe(next.state),
        toStarknet: ev.messagesToStarknet.length,
        toAppchain: ev.messagesToAppchain.length,
      },
      "state updated",
    );
    for (const l of this.listeners) {
      try {
        l(ev);
      } catch (err) {
        this.log.error({ err }, "listener failed");
      }
    }
    return ev;
  }

  onStateUpdate(listener: StateUpdateListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  /* ──────────── access control ──────────── */

  owner(): Felt {
    return this.snapshot().access.owner;
  }

  isOperator(who: Felt): boolean {
    return access.isOperator(this.snapshot().access, who);
  }

  registerOperator(caller: Felt, op: Felt) {
    this.mutateAccess(caller, (a) => access.registerOperator(a, op));
    this.log.info({ operator: feltToHex(op) }, "operator registered");
  }

  unregisterOperator(caller: Felt, op: Felt) {
    this.mutateAccess(caller, (a) => access.unregisterOperator(a, op));
    this.log.info({ operator: feltToHex(op) }, "operator unregistered");
  }

  transferOwnership(caller: Felt, next: Felt) {
    this.mutateAccess(caller, (a) => access.transferOwnership(a, next));
    this.log.info({ owner: feltToHex(next) }, "ownership transferred");
  }

  /* ──────────── program config & facts ──────────── */

  getProgramInfo(): ProgramInfo {
    return { ...this.snapshot().program };
  }

  setProgramInfo(caller: Felt, info: ProgramInfo) {
    const s = this.snapshot();
    access.assertOwner(s.access, caller);
    const program = { programHash: info.programHash, configHash: info.configHash };
    this.store.save({ ...s, program });
    this.log.info(
      {
        programHash: feltToHex(program.programHash),
        configHash: feltToHex(program.configHash),
      },
      "program info set",
    );
  }

  getFactsRegistry(): FactsRegistry | undefined {
    return this.facts;
  }

  setFactsRegistry(caller: Felt, registry: FactsRegistry | undefined) {
    access.assertOwner(this.snapshot().access, caller);
    this.facts = registry;
    this.log.info({ enabled: registry !== undefined }, "facts registry set");
  }

  /* ──────────── messaging ──────────── */

  appchainToStarknetCount(hash: Felt): bigint {
    return messageCount(this.snapshot().messages.toStarknet, hash);
  }

  starknetToAppchainCount(hash: Felt): bigint {
    return messageCount(this.snapshot().messages.toAppchain, hash);
  }

  /* ──────────── internals ──────────── */

  private snapshot(): AppchainSnapshot {
    const s = this.store.load();
    if (!s) return fail("MalformedSnapshot", "store is empty");
    return s;
  }

  private mutateAccess(
    caller: Felt,
    f: (a: AppchainSnapshot["access"]) => AppchainSnapshot["access"],
  ) {
    const s = this.snapshot();
    access.assertOwner(s.access, caller);
    this.store.save({ ...s, access: f(s.access) });
  }

  private verifyFact(program: ProgramInfo, stream: readonly Felt[]) {
    if (!this.facts) return;
    const fact = computeFact(program.programHash, stream);
    this.log.debug({ fact }, "checking fact");
    if (!this.facts.isValid(fact)) fail("InvalidFact", "output is not attested", { fact });
  }

  private describe(s: RollingState) {
    return {
      stateRoot: feltToHex(s.stateRoot),
      blockNumber: feltToHex(s.blockNumber),
      blockHash: feltToHex(s.blockHash),
    };
  }
}
