/*
Anything that can list the IPv4 blocks already in use. Implementations return
raw literals; parsing and validation happen in the planner.
*/
interface ReservationSource {
  fetch(): Promise<string[]>;
}

class StaticReservationSource implements ReservationSource {
  private readonly literals: string[];

  constructor(literals: string[]) {
    this.literals = [...literals];
  }

  async fetch(): Promise<string[]> {
    return [...this.literals];
  }
}

export {ReservationSource, StaticReservationSource};
