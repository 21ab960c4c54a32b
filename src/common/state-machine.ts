import { ConflictException } from '@nestjs/common';

export type TransitionTable<S extends string> = Readonly<
  Record<S, readonly S[]>
>;

export class InvalidTransitionError extends ConflictException {
  constructor(
    readonly entity: string,
    readonly from: string,
    readonly to: string,
  ) {
    super(`${entity} cannot move from '${from}' to '${to}'`);
  }
}

/**
 * A lifecycle described as an adjacency table. States with no outgoing
 * edges are terminal.
 */
export class Lifecycle<S extends string> {
  constructor(
    readonly entity: string,
    private readonly table: TransitionTable<S>,
  ) {}

  canTransition(from: S, to: S): boolean {
    return this.table[from].includes(to);
  }

  assertTransition(from: S, to: S): void {
    if (!this.canTransition(from, to)) {
      throw new InvalidTransitionError(this.entity, from, to);
    }
  }
}
