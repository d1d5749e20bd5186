import { describe, it, expect } from 'vitest';

import { create_host } from '../engine/host';
import {
  compare_choices,
  new_ro_sham_bo,
  ro_sham_bo,
  type Choice,
  type RoShamBoOutcome,
} from './ro_sham_bo';

/** 按原协议驱动：五次恢复，前四次挂起，第五次结束 */
function play_through(player_1: Choice, player_2: Choice) {
  const host = create_host(ro_sham_bo, new_ro_sham_bo(player_1, player_2));
  const started = host.play();
  if (!started.ok) throw new Error(`play failed: ${started.error.code}`);
  const co = started.coroutine;
  const steps = [co.resume(), co.resume(), co.resume(), co.resume(), co.resume()];
  return { host, steps };
}

const cases: Array<[Choice, Choice, string, RoShamBoOutcome]> = [
  ['Rock', 'Rock', 'Rock ties with Rock.', 'tie'],
  ['Rock', 'Paper', 'Paper beats Rock.', 'loss'],
  ['Rock', 'Scissors', 'Rock beats Scissors.', 'win'],
  ['Paper', 'Rock', 'Paper beats Rock.', 'win'],
  ['Paper', 'Paper', 'Paper ties with Paper.', 'tie'],
  ['Paper', 'Scissors', 'Scissors beats Paper.', 'loss'],
  ['Scissors', 'Rock', 'Rock beats Scissors.', 'loss'],
  ['Scissors', 'Paper', 'Scissors beats Paper.', 'win'],
  ['Scissors', 'Scissors', 'Scissors ties with Scissors.', 'tie'],
];

describe('ro_sham_bo', () => {
  it.each(cases)('%s vs %s → "%s" (%s)', (player_1, player_2, message, outcome) => {
    const { steps } = play_through(player_1, player_2);
    expect(steps).toEqual([
      { kind: 'yielded', event: 'Ro!' },
      { kind: 'yielded', event: 'Sham!' },
      { kind: 'yielded', event: 'Bo!' },
      { kind: 'yielded', event: message },
      { kind: 'complete', outcome },
    ]);
  });

  it('records every yielded message through handle_event', () => {
    const { host } = play_through('Paper', 'Rock');
    expect(host.game().log).toEqual(['Ro!', 'Sham!', 'Bo!', 'Paper beats Rock.']);
  });

  // 直接 process_event 与 yield_event 对状态的修改完全一致
  it('mutates state the same way through process_event', () => {
    const { host: played } = play_through('Scissors', 'Paper');

    const direct = create_host(ro_sham_bo, new_ro_sham_bo('Scissors', 'Paper'));
    for (const message of ['Ro!', 'Sham!', 'Bo!', 'Scissors beats Paper.']) {
      direct.process_event(message);
    }
    expect(direct.game()).toEqual(played.game());
    expect(direct.state_hash()).toBe(played.state_hash());
  });

  it('keeps game() snapshots apart from the live log', () => {
    const host = create_host(ro_sham_bo, new_ro_sham_bo('Rock', 'Paper'));
    const before = host.game();
    host.process_event('Ro!');
    expect(before.log).toEqual([]);
  });

  it('compares choices cyclically', () => {
    expect(compare_choices('Rock', 'Scissors')).toBe('win');
    expect(compare_choices('Scissors', 'Paper')).toBe('win');
    expect(compare_choices('Paper', 'Rock')).toBe('win');
    expect(compare_choices('Scissors', 'Rock')).toBe('loss');
    expect(compare_choices('Paper', 'Paper')).toBe('tie');
  });
});
