import { Prover, Context, DEFAULT_REWRITE_RULES, factToReadable, deepClone } from './prover-core.js';
import type { Fact, Command, Logger, ProofState, RewriteRules } from "./prover-core.js";

export interface ExecutedCommand {
  command: Command;
  timestamp: number;
  success: boolean;
}

export interface ProofSessionOptions {
  hypotheses?: Record<string, Fact>;
  logger?: Logger;
  rules?: RewriteRules;
}

export class ProofSession {
  private state: ProofState;
  private originalGoal: Fact;
  private prover: Prover;
  private parent: ProofSession | null;
  private children: Set<ProofSession>;
  private sessionId: string;
  private logger: Logger;
  private rules: RewriteRules;
  private executedCommands: ExecutedCommand[];
  private static sessionCounter = 0;

  constructor(
    goal: Fact,
    options: ProofSessionOptions = {},
    parent: ProofSession | null = null
  ) {
    this.sessionId = `session_${++ProofSession.sessionCounter}`;
    this.parent = parent;
    this.children = new Set();
    this.executedCommands = [];
    this.logger = options.logger || (() => {});
    this.originalGoal = deepClone(goal);
    this.rules = options.rules ?? DEFAULT_REWRITE_RULES;

    this.prover = new Prover(this.rules);
    this.prover.setLogger(this.logger);

    const context = new Context();
    for (const [name, fact] of Object.entries(options.hypotheses ?? {})) {
      context.addFact(name, fact);
      this.logger(`Added hypothesis '${name}': ${factToReadable(fact)}`);
    }

    this.state = {
      goal: deepClone(goal),
      context,
      closedBy: null
    };

    this.logger(`Created ${this.sessionId} with goal: ${factToReadable(goal)}`);

    if (this.parent) {
      this.parent.children.add(this);
    }
  }

  public getOriginalGoal(): Fact { return deepClone(this.originalGoal); }

  /**
   * Execute a single command in this session
   */
  runCommand(cmd: Command): boolean {
    if (this.state.closedBy) {
      this.logger(`Session ${this.sessionId} is already closed`);
      return false;
    }

    this.logger(`Executing command in ${this.sessionId}: ${JSON.stringify(cmd)}`);
    const success = this.prover.runCommand(this.state, cmd);

    this.executedCommands.push({
      command: deepClone(cmd),
      timestamp: Date.now(),
      success
    });

    if (success && this.prover.checkGoalProved(this.state)) {
      this.logger(`Goal proved in ${this.sessionId}!`);
    }

    return success;
  }

  /**
   * Start a nested proof of a sub-goal. The child sees every fact of this
   * session's context, plus any extra hypotheses given here.
   */
  startNestedProof(
    goal: Fact,
    options: ProofSessionOptions = {}
  ): ProofSession {
    const mergedOptions: ProofSessionOptions = {
      hypotheses: { ...this.getHypotheses(), ...(options.hypotheses ?? {}) },
      logger: options.logger ?? this.logger,
      rules: options.rules ?? this.rules
    };

    const childSession = new ProofSession(goal, mergedOptions, this);
    this.logger(`Started nested proof ${childSession.sessionId} from ${this.sessionId}`);

    return childSession;
  }

  /**
   * Add a proved child's original goal to this context under `factName`.
   * An admitted child is refused.
   */
  finalizeNestedProof(childSession: ProofSession, factName: string): boolean {
    if (!this.children.has(childSession)) {
      this.logger(`Error: ${childSession.sessionId} is not a child of ${this.sessionId}`);
      return false;
    }

    if (!childSession.isComplete()) {
      this.logger(`Error: Child session ${childSession.sessionId} is not proved`);
      return false;
    }

    if (this.state.context.has(factName)) {
      this.logger(`Error: Fact name '${factName}' already exists in context`);
      return false;
    }

    const provenGoal = childSession.getOriginalGoal();
    this.state.context.addFact(factName, provenGoal);
    this.children.delete(childSession);

    this.logger(`Finalized nested proof: added '${factName}': ${factToReadable(provenGoal)}`);
    if (this.prover.checkGoalProved(this.state)) {
      this.logger(`Goal proved in ${this.sessionId}!`);
    }
    return true;
  }

  isComplete(): boolean {
    return this.prover.checkGoalProved(this.state);
  }

  /** Closed by `sorry` rather than proved. */
  isAdmitted(): boolean {
    return this.state.closedBy === 'sorry';
  }

  getGoal(): Fact {
    return deepClone(this.state.goal);
  }

  getHypotheses(): Record<string, Fact> {
    const hypotheses: Record<string, Fact> = {};
    for (const factName of this.state.context.keys()) {
      const fact = this.state.context.getFact(factName);
      if (fact) {
        hypotheses[factName] = deepClone(fact);
      }
    }
    return hypotheses;
  }

  getFact(name: string): Fact | undefined {
    return this.state.context.getFact(name);
  }

  hasFact(name: string): boolean {
    return this.state.context.has(name);
  }

  getSessionId(): string {
    return this.sessionId;
  }

  getTranscript(): ExecutedCommand[] {
    return this.executedCommands.map(c => ({ ...c, command: deepClone(c.command) }));
  }

  getSummary(): string {
    const status = this.isComplete() ? 'proved' : this.isAdmitted() ? 'admitted' : 'open';
    const lines = [
      `Session: ${this.sessionId}`,
      `Goal: ${factToReadable(this.state.goal)}`,
      `Status: ${status}`,
      `Facts: ${this.state.context.keys().length}`,
      `Commands: ${this.executedCommands.length}`,
      `Active children: ${this.children.size}`
    ];

    if (this.parent) {
      lines.push(`Parent: ${this.parent.sessionId}`);
    }

    return lines.join('\n');
  }
}

export default ProofSession;
