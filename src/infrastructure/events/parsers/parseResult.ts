export type ParseSuccess<T> = {
  success: true;
  data: T;
};

export type ParseFailure = {
  success: false;
  error: string;
};

export type ParseResult<T> = ParseSuccess<T> | ParseFailure;

export function parsed<T>(data: T): ParseSuccess<T> {
  return { success: true, data };
}

export function parseFailure(error: string): ParseFailure {
  return { success: false, error };
}
