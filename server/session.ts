import RedisStore from 'connect-redis';
import session, { type Store } from 'express-session';
import { createClient } from 'redis';
import { logger } from './lib/logger';

export type RedisClient = ReturnType<typeof createClient>;

export function createRedisClient(redisUrl: string): RedisClient {
	const client = createClient({ url: redisUrl });
	client.on('error', (err: unknown) => logger.error('Redis client error', {}, err));
	return client;
}

export interface SessionOptions {
	secret: string;
	production: boolean;
	/** Connected client backing the store; the in-memory store is used without one. */
	redis?: RedisClient;
}

// The cart lives in the session, so the cookie only carries the opaque id
export function configureSession({ secret, production, redis }: SessionOptions) {
	let store: Store | undefined;
	if (redis) {
		store = new RedisStore({ client: redis, prefix: 'harbor:sess:' });
	} else if (production) {
		logger.warn('REDIS_URL not set; using in-memory session store (not recommended for production).');
	}

	return session({
		...(store ? { store } : {}),
		secret,
		resave: false,
		saveUninitialized: false,
		name: 'harbor.sid',
		cookie: {
			httpOnly: true,
			secure: production,
			sameSite: 'lax',
			maxAge: 1000 * 60 * 60 * 12,
			...(process.env.COOKIE_DOMAIN ? { domain: process.env.COOKIE_DOMAIN } : {}),
		},
	});
}
