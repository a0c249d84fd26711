import pino from "pino";
import { createActor, type Actor } from "xstate";
import type { FeedItem, RankedItem } from "../types/feed.js";
import { parseFeed } from "../types/feed.js";
import type { ExperimentHistory } from "../types/episode.js";
import { parseEngineConfig, type EngineConfig, type EngineConfigInput } from "../types/config.js";
import { ledger } from "../ledger/ledger.js";
import { tracker } from "../ledger/tracker.js";
import { createScorer, type Scorer } from "../scoring/scorer.js";
import { selectorRegistry, type Selector } from "../selection/selector.js";
import { createTrialInjector, type TrialInjector } from "../trials/trial-injector.js";
import { monitor, type MonitorConfig, type MonitorState } from "../convergence/monitor.js";
import { createRandom, type RandomSource } from "../random/random.js";
import { engineMachine, type EngineStatus } from "./engine-machine.js";
import { createEngineState, freezeRecords, type EngineState } from "./engine-state.js";

export interface EngineOptions {
  /** Extra selectors the configured `selector` name may refer to. */
  selectors?: readonly Selector[];
  /** Replaces the seeded xorshift source built from `config.seed`. */
  random?: RandomSource;
  logger?: pino.Logger;
}

const silentLogger = pino({ level: "silent" });

/**
 * Online sequence re-ranker. Each step() takes one episode of reward feedback and
 * returns the ordering to try next: scored and re-selected on optimization episodes,
 * with unseen population members injected, and stopped or restarted when the
 * convergence monitor says so.
 *
 * Not safe for concurrent steps; callers serialize access to one instance.
 */
export class FeedRankEngine {
  readonly config: EngineConfig;
  private state: EngineState;
  private readonly scorer: Scorer;
  private readonly selector: Selector;
  private readonly injector: TrialInjector;
  private readonly rng: RandomSource;
  private actor: Actor<typeof engineMachine>;
  private readonly log: pino.Logger;
  private readonly monitorConfig: MonitorConfig;

  constructor(config: EngineConfigInput = {}, options: EngineOptions = {}) {
    this.config = parseEngineConfig(config);
    this.scorer = createScorer(this.config.scorer);
    this.selector = selectorRegistry.get(this.config.selector, options.selectors);
    this.injector = createTrialInjector({ n: this.config.nTry, insertion: this.config.insertion });
    this.monitorConfig = {
      episodeCeiling: this.config.episodeCeiling,
      patience: this.config.earlyStopPatience,
      startAt: this.config.earlyStopStartAt,
      restartOnStagnation: this.config.restartOnStagnation,
    };
    this.state = createEngineState(this.config);
    this.rng = options.random ?? createRandom(this.config.seed);
    this.log = options.logger ?? silentLogger;
    this.actor = createActor(engineMachine, { input: {} });
    this.actor.start();
  }

  /**
   * Rebuild an engine from a state captured by toState(). The state is copied; the
   * random source resumes from `state.randomState` unless `options.random` is given.
   */
  static fromState(state: EngineState, options: EngineOptions = {}): FeedRankEngine {
    const engine = new FeedRankEngine(state.config, {
      ...options,
      random: options.random ?? createRandom(state.randomState),
    });
    engine.hydrate(structuredClone(state));
    return engine;
  }

  private hydrate(state: EngineState): void {
    this.state = freezeRecords({ ...state, config: this.config });
    this.actor.stop();
    this.actor = createActor(engineMachine, { input: { ...state.machine } });
    this.actor.start();
  }

  /**
   * Submit one episode of feedback and get the next ordering.
   * Throws FeedShapeError for malformed feeds, before any state changes.
   */
  step(input: readonly FeedItem[]): RankedItem[] {
    const feed = parseFeed(input);
    const signal = monitor.evaluate(this.state.monitor, this.state.ledger.records, this.monitorConfig);

    if (signal === "restart") {
      const closed = this.state.experimentId;
      tracker.resetExperiment(this.state);
      monitor.reset(this.state.monitor);
      this.actor.send({ type: "RESTART" });
      this.log.info(
        { experiment: closed, next: this.state.experimentId, restarts: this.restarts },
        "ordering stagnated, restarting experiment",
      );
    } else if (signal === "stop") {
      const { reason } = this.state.monitor;
      if (this.status === "running" && reason) {
        this.actor.send({ type: "STOP", reason });
        this.log.info({ experiment: this.state.experimentId, episode: this.state.episode, reason }, "experiment stopped");
      }
      tracker.addExperiment(this.state);
      return this.feedOut;
    }

    this.runEpisode(feed);
    return this.feedOut;
  }

  private runEpisode(feed: FeedItem[]): void {
    const episode = this.state.episode;
    const isOpt = this.isOptEpisode;
    const ls = this.state.ledger;

    ledger.logFeed(ls, feed);
    if (isOpt) {
      const ordering = this.selector.select(this.scorer.score(ls.feeds));
      const trial = this.injector.inject(ordering, ledger.unusedItems(ls, this.config), this.rng);
      ls.feedOut = trial.feed;
      ls.itemsAdded = trial.itemsAdded;
      this.log.debug(
        { experiment: this.state.experimentId, episode, size: trial.feed.length, itemsAdded: trial.itemsAdded },
        "optimized ordering",
      );
    } else {
      ls.itemsAdded = [];
    }
    ledger.logEpisode(ls, episode, isOpt);
    this.state.episode += 1;
  }

  /** Close the open experiment and start a fresh one, recovering from a stop. */
  reset(): void {
    const closed = this.state.experimentId;
    tracker.resetExperiment(this.state);
    monitor.reset(this.state.monitor);
    this.actor.send({ type: "RESET" });
    this.log.info({ experiment: closed, next: this.state.experimentId }, "experiment reset");
  }

  /** Deep copy of the engine's state, including run status and random state. */
  toState(): EngineState {
    const { context } = this.actor.getSnapshot();
    return structuredClone({
      ...this.state,
      machine: {
        status: this.status,
        restarts: context.restarts,
        resets: context.resets,
        stopReason: context.stopReason,
      },
      randomState: this.rng.getState(),
    });
  }

  get status(): EngineStatus {
    return this.actor.getSnapshot().matches("stopped") ? "stopped" : "running";
  }

  get restarts(): number {
    return this.actor.getSnapshot().context.restarts;
  }

  /** Number of the next episode in the open experiment. */
  get episode(): number {
    return this.state.episode;
  }

  get experimentId(): number {
    return this.state.experimentId;
  }

  /** Whether the next step scores, selects and injects. */
  get isOptEpisode(): boolean {
    return this.state.episode % this.config.optInterval === 0;
  }

  get population(): string[] {
    return ledger.population(this.state.ledger, this.config);
  }

  get unusedItems(): string[] {
    return ledger.unusedItems(this.state.ledger, this.config);
  }

  get experiments(): ExperimentHistory {
    return tracker.experiments(this.state);
  }

  get output(): readonly RankedItem[] | null {
    return tracker.output(this.state);
  }

  /** Copy of the current ordering; editing it leaves the engine untouched. */
  get feedOut(): RankedItem[] {
    return (this.state.ledger.feedOut ?? []).map((item) => ({ ...item }));
  }

  get monitorState(): MonitorState {
    return structuredClone(this.state.monitor);
  }
}
