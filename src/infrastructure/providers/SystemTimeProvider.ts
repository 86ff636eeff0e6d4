import type { ITimeProvider } from "../../core/providers/ITimeProvider";

export class SystemTimeProvider implements ITimeProvider {
  now(): Date {
    return new Date();
  }
}
