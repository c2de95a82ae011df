import { ValidationError, type SubroutineFile } from '@toolpath/shared';
import { renderProgram, subroutineEnd, type Block } from './gcode';

export type SubroutineKind = 'drill' | 'circle' | 'hexagon' | 'line';

export const SUBROUTINE_RANGES: Readonly<Record<SubroutineKind, { first: number; last: number }>> = {
  drill: { first: 1000, last: 1099 },
  circle: { first: 1100, last: 1199 },
  hexagon: { first: 1200, last: 1299 },
  line: { first: 1300, last: 1399 },
};

/**
 * Numbers and stores subroutine bodies for one generation run. A body that
 * was already registered for the same kind gets its existing number back.
 */
export class SubroutineRegistry {
  private readonly contents = new Map<number, string>();
  private readonly numbersByBody = new Map<string, number>();
  private readonly next: Record<SubroutineKind, number> = {
    drill: SUBROUTINE_RANGES.drill.first,
    circle: SUBROUTINE_RANGES.circle.first,
    hexagon: SUBROUTINE_RANGES.hexagon.first,
    line: SUBROUTINE_RANGES.line.first,
  };

  /**
   * @param body subroutine lines without the closing `M99` and `%`.
   * @throws ValidationError when the kind's number range is used up.
   */
  register(kind: SubroutineKind, body: readonly Block[]): number {
    const content = renderProgram([...body, ...subroutineEnd()]);
    const key = `${kind}\n${content}`;
    const existing = this.numbersByBody.get(key);
    if (existing !== undefined) {
      return existing;
    }
    const number = this.next[kind];
    const range = SUBROUTINE_RANGES[kind];
    if (number > range.last) {
      throw new ValidationError([
        `Too many distinct ${kind} subroutines: numbers ${range.first}-${range.last} are all in use`,
      ]);
    }
    this.next[kind] = number + 1;
    this.numbersByBody.set(key, number);
    this.contents.set(number, content);
    return number;
  }

  files(): SubroutineFile[] {
    return [...this.contents.entries()]
      .sort(([a], [b]) => a - b)
      .map(([number, content]) => ({ number, content }));
  }
}
