/**
 * Playback infrastructure exports
 */

export { ClockAudioOutput } from './ClockAudioOutput';
