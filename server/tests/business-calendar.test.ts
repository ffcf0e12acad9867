import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { BusinessCalendar, FixedClock } from '../src/lib/time/business-calendar.js';

describe('BusinessCalendar', () => {
  it('reports epoch seconds from the clock', () => {
    const calendar = new BusinessCalendar(new FixedClock('2026-03-14T12:00:00Z'), 'UTC');
    assert.equal(calendar.nowSeconds(), 1773489600);
  });

  it('rolls over at midnight, not after 24 hours', () => {
    const clock = new FixedClock('2026-03-14T23:59:59Z');
    const calendar = new BusinessCalendar(clock, 'UTC');

    assert.equal(calendar.today(), '2026-03-14');

    clock.advanceSeconds(1);
    assert.equal(calendar.today(), '2026-03-15');
  });

  it('uses the business time zone for the date', () => {
    const calendar = new BusinessCalendar(new FixedClock('2026-03-14T16:00:00Z'), 'Asia/Tokyo');

    // 01:00 on the 15th in Tokyo
    assert.equal(calendar.today(), '2026-03-15');
    assert.equal(calendar.dayOf(1773489600), '2026-03-14');
  });

  it('lets tests move the clock to an arbitrary instant', () => {
    const clock = new FixedClock('2026-03-14T12:00:00Z');
    const calendar = new BusinessCalendar(clock, 'UTC');

    clock.set('2026-12-31T08:30:00Z');
    assert.equal(calendar.today(), '2026-12-31');
  });
});
