// Body of every HTTP error reply.
export interface ErrorResponseBody {
  statusCode: number;
  message: string | string[];
  error?: string;               // HTTP reason phrase, e.g. "Bad Request"
  timestamp: string;
  path?: string;                // set once the request is known
}
