import { Injectable, NotFoundException } from '@nestjs/common';
import type { PipeTransform } from '@nestjs/common';

/** Largest value a Postgres `integer` primary key can hold. */
export const MAX_ROW_ID = 2_147_483_647;

/**
 * Path ids that can't name a row (non-numeric, zero, or past the `integer` range)
 * 404 like an unknown id instead of reaching the database.
 */
@Injectable()
export class ParseIdPipe implements PipeTransform<unknown, number> {
  transform(value: unknown): number {
    const raw = typeof value === 'string' ? value : '';
    if (!/^\d{1,10}$/.test(raw)) throw new NotFoundException('Not found.');
    const id = Number(raw);
    if (id < 1 || id > MAX_ROW_ID) throw new NotFoundException('Not found.');
    return id;
  }
}
