import { ulid } from 'ulid';

export function newJobId(): string {
  return `job_${ulid()}`;
}
