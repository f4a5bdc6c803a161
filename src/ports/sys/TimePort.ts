export interface TimePort {
  now(): number;
}
