/**
 * Per-WorkUnit arena. Collects each unit's terminal invocations and their
 * parsed outputs, and hands the unit off exactly once, when its whole roster
 * is terminal. Records of one unit never see another unit's invocations.
 */

import type {
  Invocation,
  ParsedOutput,
  Role,
  WorkUnit,
  WorkerAssignment,
} from "../../types.js";

export interface SettledUnit {
  unit: WorkUnit;
  roster: WorkerAssignment[];
  invocations: Invocation[];
  parsed: Map<Role, ParsedOutput>;
}

interface ArenaSlot {
  unit: WorkUnit;
  roster: WorkerAssignment[];
  invocations: Map<Role, Invocation>;
  parsed: Map<Role, ParsedOutput>;
  finalized: boolean;
}

const TERMINAL = new Set(["Succeeded", "TimedOut", "Failed", "Malformed"]);

export class WorkUnitArena {
  private readonly slots = new Map<string, ArenaSlot>();

  constructor(
    entries: ReadonlyArray<{ unit: WorkUnit; roster: WorkerAssignment[] }>,
    private readonly onUnitSettled: (settled: SettledUnit) => void
  ) {
    for (const { unit, roster } of entries) {
      this.slots.set(unit.id, {
        unit,
        roster,
        invocations: new Map(),
        parsed: new Map(),
        finalized: false,
      });
    }
  }

  /**
   * Records one terminal invocation. Fires the unit hand-off when this was the
   * last outstanding role. Unknown units, non-terminal or repeated records are
   * rejected.
   */
  record(invocation: Invocation, parsed: ParsedOutput | null): void {
    const slot = this.slots.get(invocation.workUnitId);
    if (!slot) throw new Error(`[WorkUnitArena] Unknown work unit: ${invocation.workUnitId}`);
    if (!TERMINAL.has(invocation.status)) {
      throw new Error(`[WorkUnitArena] ${invocation.workUnitId}/${invocation.role} is not terminal (${invocation.status})`);
    }
    if (!slot.roster.some((a) => a.role === invocation.role)) {
      throw new Error(`[WorkUnitArena] ${invocation.role} is not on the roster of ${invocation.workUnitId}`);
    }
    if (slot.invocations.has(invocation.role)) {
      throw new Error(`[WorkUnitArena] ${invocation.workUnitId}/${invocation.role} recorded twice`);
    }

    slot.invocations.set(invocation.role, invocation);
    if (parsed) slot.parsed.set(invocation.role, parsed);

    if (!slot.finalized && slot.invocations.size === slot.roster.length) {
      slot.finalized = true;
      this.onUnitSettled({
        unit: slot.unit,
        roster: slot.roster,
        // roster order, regardless of completion order
        invocations: slot.roster.flatMap((a) => {
          const inv = slot.invocations.get(a.role);
          return inv ? [inv] : [];
        }),
        parsed: slot.parsed,
      });
    }
  }
}
