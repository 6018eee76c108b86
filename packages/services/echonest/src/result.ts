// ABOUTME: Read-only wrapper around one raw item of an Echo Nest response.
// ABOUTME: Pairs a kind label ("audio", "biography", ...) with the item's raw fields.

import { MissingFieldError } from '@tastemaker/shared';

export type ResultKind =
  | 'audio'
  | 'biography'
  | 'blogs'
  | 'image'
  | 'news'
  | 'review'
  | 'urls'
  | 'video';

export class Result {
  readonly fields: Readonly<Record<string, unknown>>;

  constructor(
    readonly kind: ResultKind,
    raw: Record<string, unknown>
  ) {
    this.fields = Object.freeze({ ...raw });
  }

  has(field: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.fields, field);
  }

  /**
   * Raw value of a field the service returned.
   * @throws MissingFieldError when the item has no such field
   */
  get(field: string): unknown {
    if (!this.has(field)) {
      throw new MissingFieldError(this.kind, field);
    }
    return this.fields[field];
  }

  toJSON(): Record<string, unknown> {
    return { kind: this.kind, ...this.fields };
  }

  toString(): string {
    const labelField = ['name', 'title', 'url', 'id'].find((field) => this.has(field));
    return labelField ? `<${this.kind} - ${String(this.fields[labelField])}>` : `<${this.kind}>`;
  }
}
