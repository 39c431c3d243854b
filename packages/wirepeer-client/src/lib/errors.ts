import { Data } from 'effect';

export class ConnInfoError extends Data.TaggedError('ConnInfoError')<
  Readonly<{
    readonly message: string;
    readonly conninfo: string;
    readonly position: number;
  }>
> {}

export class ConnectionError extends Data.TaggedError('ConnectionError')<
  Readonly<{
    readonly message: string;
    readonly conninfo: string;
  }>
> {}

export class QueryError extends Data.TaggedError('QueryError')<
  Readonly<{
    readonly message: string;
    readonly query: string;
    readonly status: number;
  }>
> {}
