import { parseYielded } from '@tfweave/block-core';

import { orderSources, startProducer } from './block-source.js';
import {
  CycleError,
  ErrorCode,
  ExportNotFoundError,
  SourceExecutionError,
  TfweaveError,
  UnknownSourceError,
  VariableNotDefinedError,
} from './errors.js';

import type { BlockSource, ResumableProducer } from './block-source.js';
import type { RenderContext } from './render-context.js';
import type { Logger } from '../utils/logger.js';
import type { BlockItem, ConfigValue, ValueRequest } from '@tfweave/block-core';

export type SourceState = 'pending' | 'running' | 'parked' | 'done' | 'failed';

export interface DependencyEdge {
  requester: string;
  target: string;
  key: string;
}

type Resume = { kind: 'next'; value: ConfigValue | undefined } | { kind: 'throw'; error: Error };

type Resolution = Resume | { kind: 'blocked'; edge?: DependencyEdge };

interface SourceRecord {
  source: BlockSource;
  state: SourceState;
  producer?: ResumableProducer;
  exports: Map<string, ConfigValue>;
  request?: ValueRequest;
  resume?: Resume;
}

export interface SchedulerOptions {
  logger?: Logger;
}

export interface ScheduleResult {
  /** Source names in the order they finished. */
  completed: string[];
}

/**
 * Drives every block source to completion, one at a time.
 * A source that asks for something not yet available parks until it is; a stall with parked
 * sources left is either an undefined variable (raised into the asker) or a dependency cycle.
 */
export class Scheduler {
  private readonly records = new Map<string, SourceRecord>();
  private readonly order: string[];
  private readonly queue: string[];
  private readonly parked: SourceRecord[] = [];
  private readonly edges = new Map<string, DependencyEdge>();
  private readonly completed: string[] = [];
  private readonly logger?: Logger;

  constructor(
    sources: readonly BlockSource[],
    private readonly context: RenderContext,
    options: SchedulerOptions = {},
  ) {
    this.logger = options.logger;
    this.order = orderSources(sources).map((source) => {
      if (this.records.has(source.name)) {
        throw new TfweaveError(
          ErrorCode.INVALID_ARGUMENT,
          `two definition sources are named ${source.name}`,
        );
      }
      this.records.set(source.name, { source, state: 'pending', exports: new Map() });
      return source.name;
    });
    this.queue = [...this.order];
  }

  stateOf(name: string): SourceState | undefined {
    return this.records.get(name)?.state;
  }

  async run(): Promise<ScheduleResult> {
    try {
      for (;;) {
        const name = this.queue.shift();
        if (name === undefined) {
          if (this.parked.length === 0) break;
          const waitingOnVariable = this.findVariableCycle();
          if (waitingOnVariable) throw new CycleError(waitingOnVariable);
          if (this.releaseUndefinedVariables()) continue;
          throw new CycleError(this.findCycle());
        }
        const record = this.records.get(name);
        if (!record) continue;
        await this.step(record);
        this.wakeParked();
      }
    } catch (error) {
      await this.abort();
      throw error;
    }
    return { completed: [...this.completed] };
  }

  private async step(record: SourceRecord): Promise<void> {
    const name = record.source.name;
    record.state = 'running';
    let input: Resume = record.resume ?? { kind: 'next', value: undefined };
    record.resume = undefined;
    record.request = undefined;
    this.edges.delete(name);

    if (!record.producer) {
      try {
        record.producer = startProducer(record.source);
      } catch (error) {
        record.state = 'failed';
        throw new SourceExecutionError(name, error);
      }
    }
    const producer = record.producer;

    for (;;) {
      let result: IteratorResult<unknown, unknown>;
      try {
        result =
          input.kind === 'throw' ? await producer.throw(input.error) : await producer.next(input.value);
      } catch (error) {
        record.state = 'failed';
        if (input.kind === 'throw' && error === input.error) throw error;
        throw new SourceExecutionError(name, error);
      }

      if (result.done) {
        record.state = 'done';
        this.context.publishExports(name, record.exports);
        this.completed.push(name);
        this.logger?.debug(`[scheduler] ${name} done`);
        return;
      }

      let items: BlockItem[];
      try {
        items = parseYielded(result.value, record.source.kind);
      } catch (error) {
        record.state = 'failed';
        throw new SourceExecutionError(name, error);
      }

      input = { kind: 'next', value: undefined };
      for (const item of items) {
        switch (item.kind) {
          case 'fragment': {
            try {
              this.context.commit(name, item);
            } catch (error) {
              record.state = 'failed';
              throw error;
            }
            break;
          }
          case 'export': {
            if (record.exports.has(item.name)) {
              record.state = 'failed';
              throw new SourceExecutionError(
                name,
                new Error(`export '${item.name}' is declared more than once`),
              );
            }
            record.exports.set(item.name, item.value);
            break;
          }
          case 'request': {
            const resolution = this.resolve(record, item);
            if (resolution.kind === 'blocked') {
              this.park(record, item, resolution.edge);
              return;
            }
            input = resolution;
            break;
          }
        }
      }
    }
  }

  private park(record: SourceRecord, request: ValueRequest, edge?: DependencyEdge): void {
    record.state = 'parked';
    record.request = request;
    this.parked.push(record);
    if (edge) this.edges.set(record.source.name, edge);
    this.logger?.debug(
      `[scheduler] ${record.source.name} parked on ${edge ? `${edge.target}:${edge.key}` : describeRequest(request)}`,
    );
  }

  private resolve(record: SourceRecord, request: ValueRequest): Resolution {
    const consumer = record.source.name;
    if (request.from === 'export') {
      const target = this.records.get(request.source);
      if (!target) {
        return { kind: 'throw', error: new UnknownSourceError(consumer, request.source) };
      }
      if (target.state !== 'done') {
        return {
          kind: 'blocked',
          edge: { requester: consumer, target: request.source, key: request.key },
        };
      }
      const table = this.context.exportsOf(request.source);
      if (!table || !table.has(request.key)) {
        return {
          kind: 'throw',
          error: new ExportNotFoundError(consumer, request.source, request.key),
        };
      }
      return { kind: 'next', value: table.get(request.key) };
    }

    const blocker = this.order.find(
      (name) =>
        name !== consumer &&
        this.context.contributesValues(name) &&
        this.records.get(name)?.state !== 'done',
    );
    if (blocker) {
      return {
        kind: 'blocked',
        edge: { requester: consumer, target: blocker, key: `var.${request.name}` },
      };
    }

    if (!this.context.variables.isDefined(request.name)) {
      const othersRunning = this.order.some(
        (name) => name !== consumer && this.records.get(name)?.state !== 'done',
      );
      if (othersRunning) return { kind: 'blocked' };
    }

    try {
      return { kind: 'next', value: this.context.variables.resolve(request.name, consumer) };
    } catch (error) {
      if (error instanceof TfweaveError) return { kind: 'throw', error };
      throw error;
    }
  }

  /** Move parked sources whose requests can now be answered to the back of the run queue, in park order. */
  private wakeParked(): void {
    for (const record of [...this.parked]) {
      if (!record.request) continue;
      const resolution = this.resolve(record, record.request);
      if (resolution.kind === 'blocked') continue;
      this.unpark(record, resolution);
    }
  }

  /**
   * A source waiting on an undefined variable waits on every unfinished source. If a parked
   * source's edges lead back to that waiter, the variable may only appear after the waiter
   * finishes: report the loop, starting at the waiter.
   */
  private findVariableCycle(): string[] | undefined {
    for (const waiter of this.parked) {
      const name = waiter.source.name;
      if (waiter.request?.from !== 'variable' || this.edges.has(name)) continue;
      for (const other of this.parked) {
        if (other === waiter) continue;
        const path: string[] = [];
        let current: string | undefined = other.source.name;
        while (current !== undefined && current !== name && !path.includes(current)) {
          path.push(current);
          current = this.edges.get(current)?.target;
        }
        if (current === name) return [name, ...path];
      }
    }
    return undefined;
  }

  /** At a stall, variables nobody defined will never appear: raise that into the askers. */
  private releaseUndefinedVariables(): boolean {
    let released = false;
    for (const record of [...this.parked]) {
      const request = record.request;
      if (!request || request.from !== 'variable' || this.edges.has(record.source.name)) continue;
      this.unpark(record, {
        kind: 'throw',
        error: new VariableNotDefinedError(request.name, record.source.name),
      });
      released = true;
    }
    return released;
  }

  private unpark(record: SourceRecord, resume: Resume): void {
    const index = this.parked.indexOf(record);
    if (index >= 0) this.parked.splice(index, 1);
    record.resume = resume;
    this.queue.push(record.source.name);
    this.logger?.debug(`[scheduler] ${record.source.name} ready`);
  }

  /** Follow dependency edges from the first parked source until a source repeats. */
  private findCycle(): string[] {
    const start = this.parked[0]?.source.name;
    if (start === undefined) return [];
    const path: string[] = [];
    let current: string | undefined = start;
    while (current !== undefined && !path.includes(current)) {
      path.push(current);
      current = this.edges.get(current)?.target;
    }
    if (current === undefined) return path;
    return path.slice(path.indexOf(current));
  }

  private async abort(): Promise<void> {
    for (const record of this.records.values()) {
      if (!record.producer || record.state === 'done') continue;
      if (record.state !== 'failed') record.state = 'failed';
      try {
        await record.producer.close();
      } catch (error) {
        this.logger?.debug(
          `[scheduler] closing ${record.source.name} failed: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }
  }
}

function describeRequest(request: ValueRequest): string {
  return request.from === 'export' ? `${request.source}:${request.key}` : `var.${request.name}`;
}
