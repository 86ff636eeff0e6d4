export interface ITimeProvider {
  now(): Date;
}
