import cors, { CorsOptions } from 'cors';

type OriginCallback = (err: Error | null, allow?: boolean) => void;

// An empty allow-list lets the storefront run from any origin
export function buildCorsOriginHandler(origins: string[]) {
  return (origin: string | undefined, cb: OriginCallback) => {
    if (!origin) return cb(null, true);
    if (origins.length === 0 || origins.includes(origin)) return cb(null, true);
    return cb(new Error('Not allowed by CORS'));
  };
}

export function buildCors(origins: string[]): ReturnType<typeof cors> {
  const opts: CorsOptions = {
    origin: buildCorsOriginHandler(origins),
    credentials: true,
  };
  return cors(opts);
}
