export type { ITrackQueue } from './interfaces';
