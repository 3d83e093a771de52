import { v4 as uuid, validate } from "uuid";

export function newId(): string {
  return uuid();
}

export function isId(value: string): boolean {
  return validate(value);
}
