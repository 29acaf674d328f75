/**
 * Single-flight registry: at most one computation per key at a time.
 *
 * A flight stays registered through its publish step, so callers arriving
 * while the result is being written back still share it. A failed flight is
 * dropped as soon as it settles and the next caller starts afresh.
 */
export class InFlightRegistry<T> {
  private readonly flights = new Map<string, Promise<T>>();

  constructor(private readonly onPublishError: (error: unknown, key: string) => void) {}

  get size(): number {
    return this.flights.size;
  }

  join(key: string): Promise<T> | undefined {
    return this.flights.get(key);
  }

  /**
   * Register and run a new flight for `key`.
   *
   * @param compute - Produces the shared result
   * @param publish - Runs after a successful compute, before the flight is removed
   */
  start(key: string, compute: () => Promise<T>, publish: (value: T) => Promise<void>): Promise<T> {
    const flight = Promise.resolve().then(compute);
    this.flights.set(key, flight);

    void flight.then(
      async (value) => {
        try {
          await publish(value);
        } catch (error) {
          this.onPublishError(error, key);
        } finally {
          this.remove(key, flight);
        }
      },
      () => this.remove(key, flight)
    );

    return flight;
  }

  private remove(key: string, flight: Promise<T>): void {
    if (this.flights.get(key) === flight) {
      this.flights.delete(key);
    }
  }
}
