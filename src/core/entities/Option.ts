export type Some<T> = {
  present: true;
  value: T;
};

export type None = {
  present: false;
};

export type Option<T> = Some<T> | None;

export function some<T>(value: T): Some<T> {
  return { present: true, value };
}

export const none: None = { present: false };

export function fromNullable<T>(value: T | null | undefined): Option<T> {
  return value === null || value === undefined ? none : some(value);
}

export function getOrElse<T>(option: Option<T>, fallback: T): T {
  return option.present ? option.value : fallback;
}

export function toNullable<T>(option: Option<T>): T | null {
  return option.present ? option.value : null;
}
