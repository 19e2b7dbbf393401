import { Clock } from '../types';

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};
