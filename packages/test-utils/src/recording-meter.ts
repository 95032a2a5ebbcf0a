/**
 * OTel Meter that records counter and histogram updates for assertions.
 * Every other instrument is a no-op.
 */

import {
  type Attributes,
  type BatchObservableCallback,
  type Counter,
  createNoopMeter,
  type Gauge,
  type Histogram,
  type Meter,
  type MetricOptions,
  type Observable,
  type ObservableCounter,
  type ObservableGauge,
  type ObservableUpDownCounter,
  type UpDownCounter,
} from "@opentelemetry/api";

export interface RecordedValue {
  readonly value: number;
  readonly attributes?: Attributes;
}

export class RecordingMeter implements Meter {
  private readonly noop = createNoopMeter();
  private readonly recorded = new Map<string, RecordedValue[]>();

  /** Every update made to the instrument called `name`, in order */
  values(name: string): readonly RecordedValue[] {
    return this.recorded.get(name) ?? [];
  }

  /** Sum of every update made to the instrument called `name` */
  total(name: string): number {
    return this.values(name).reduce((sum, entry) => sum + entry.value, 0);
  }

  private record(name: string, value: number, attributes?: Attributes): void {
    const entries = this.recorded.get(name) ?? [];
    entries.push(attributes === undefined ? { value } : { value, attributes });
    this.recorded.set(name, entries);
  }

  createCounter<A extends Attributes = Attributes>(
    name: string,
    _options?: MetricOptions,
  ): Counter<A> {
    return {
      add: (value: number, attributes?: A) => this.record(name, value, attributes),
    };
  }

  createHistogram<A extends Attributes = Attributes>(
    name: string,
    _options?: MetricOptions,
  ): Histogram<A> {
    return {
      record: (value: number, attributes?: A) => this.record(name, value, attributes),
    };
  }

  createGauge<A extends Attributes = Attributes>(name: string, options?: MetricOptions): Gauge<A> {
    return this.noop.createGauge<A>(name, options);
  }

  createUpDownCounter<A extends Attributes = Attributes>(
    name: string,
    options?: MetricOptions,
  ): UpDownCounter<A> {
    return this.noop.createUpDownCounter<A>(name, options);
  }

  createObservableGauge<A extends Attributes = Attributes>(
    name: string,
    options?: MetricOptions,
  ): ObservableGauge<A> {
    return this.noop.createObservableGauge<A>(name, options);
  }

  createObservableCounter<A extends Attributes = Attributes>(
    name: string,
    options?: MetricOptions,
  ): ObservableCounter<A> {
    return this.noop.createObservableCounter<A>(name, options);
  }

  createObservableUpDownCounter<A extends Attributes = Attributes>(
    name: string,
    options?: MetricOptions,
  ): ObservableUpDownCounter<A> {
    return this.noop.createObservableUpDownCounter<A>(name, options);
  }

  addBatchObservableCallback<A extends Attributes = Attributes>(
    callback: BatchObservableCallback<A>,
    observables: Observable<A>[],
  ): void {
    this.noop.addBatchObservableCallback<A>(callback, observables);
  }

  removeBatchObservableCallback<A extends Attributes = Attributes>(
    callback: BatchObservableCallback<A>,
    observables: Observable<A>[],
  ): void {
    this.noop.removeBatchObservableCallback<A>(callback, observables);
  }
}
