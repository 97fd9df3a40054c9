import { LintGroup, LintId } from "./types";

export class UnknownLintInGroupError extends Error {
  readonly id: LintId;
  readonly group: LintGroup;

  constructor(id: LintId, group: LintGroup) {
    super(`lint ${id} not in group ${group}`);
    this.name = "UnknownLintInGroupError";
    this.id = id;
    this.group = group;
  }
}

export class ExceptionNotInGroupError extends Error {
  readonly id: LintId;
  readonly group: LintGroup;

  constructor(id: LintId, group: LintGroup) {
    super(`lint ${id} not part of group ${group}`);
    this.name = "ExceptionNotInGroupError";
    this.id = id;
    this.group = group;
  }
}

export class HttpError extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, status?: number) {
    super(`Failed to fetch lint catalog from ${url}: ${message}`);
    this.name = "HttpError";
    this.url = url;
    this.status = status;
  }
}

export class DecodeError extends Error {
  constructor(message: string) {
    super(`Invalid lint catalog: ${message}`);
    this.name = "DecodeError";
  }
}

export class ArgsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArgsError";
  }
}
