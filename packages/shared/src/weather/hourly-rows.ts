/**
 * Collects element values per UTC hour while a response is parsed
 */

import type { ElementValues, ObservationRow } from '../types/observation';
import { floorToHour } from '../utils/time';

export class HourlyRowBuilder {
    private readonly hours = new Map<number, ElementValues>();

    get size(): number {
        return this.hours.size;
    }

    /**
     * Register an hour even if it ends up with no values
     */
    touch(timeMs: number): ElementValues {
        const hour = floorToHour(timeMs);
        let values = this.hours.get(hour);
        if (!values) {
            values = {};
            this.hours.set(hour, values);
        }
        return values;
    }

    // First value for an (hour, element) pair wins
    set(timeMs: number, name: string, value: number): void {
        const values = this.touch(timeMs);
        if (!Object.prototype.hasOwnProperty.call(values, name)) {
            values[name] = value;
        }
    }

    build(): ObservationRow[] {
        return [...this.hours.entries()]
            .sort(([a], [b]) => a - b)
            .map(([hour, values]) => ({ time: new Date(hour), values: { ...values } }));
    }
}
