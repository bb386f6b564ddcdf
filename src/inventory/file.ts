import fs = require('fs');
import {InvalidRequestError} from '../planner/errors';
import {ReservationSource} from './source';

/*
Offline snapshot: a JSON file holding an array of CIDR strings, e.g.
["10.0.0.0/16", "172.16.0.0/24"]
*/
class FileReservationSource implements ReservationSource {
  constructor(private readonly path: string) {}

  async fetch(): Promise<string[]> {
    const content = await fs.promises.readFile(this.path, 'utf-8');
    const parsed: unknown = JSON.parse(content);

    if (!Array.isArray(parsed)) {
      throw new InvalidRequestError(
        `${this.path} must contain a JSON array of CIDR strings`
      );
    }

    const items: unknown[] = parsed;

    return items.filter(item => item !== null).map(item => String(item));
  }
}

export {FileReservationSource};
