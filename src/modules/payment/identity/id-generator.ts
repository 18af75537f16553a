import { Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';

export const ID_GENERATOR = Symbol('ID_GENERATOR');

/** Source of payment identifiers. Must never repeat within a process. */
export interface IdGenerator {
  generate(): string | Promise<string>;
}

@Injectable()
export class UuidIdGenerator implements IdGenerator {
  generate(): string {
    return uuidv4();
  }
}
