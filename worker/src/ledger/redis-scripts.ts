/**
 * Lua scripts backing the Redis ledger. Each runs atomically on the server,
 * which is what makes lease acquisition and fenced commits compare-and-set.
 *
 * The caller passes its clock in ms; lease expiry is compared against that
 * value, so worker clocks must be kept in sync.
 */

/**
 * KEYS: job hash, active index
 * ARGV: id, now ms, created_at ISO, status, pipeline JSON, input_key
 */
export const CREATE_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 1 then return 0 end
redis.call('HSET', KEYS[1],
  'id', ARGV[1],
  'status', ARGV[4],
  'pipeline', ARGV[5],
  'input_key', ARGV[6],
  'progress', '0',
  'error', '',
  'created_at', ARGV[3],
  'updated_at', ARGV[3],
  'updated_at_ms', ARGV[2])
redis.call('ZADD', KEYS[2], ARGV[2], ARGV[1])
return 1
`;

/**
 * KEYS: job hash
 * ARGV: holder, ttl ms, now ms
 */
export const ACQUIRE_LEASE_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 0 then return 'not_found' end
local now = tonumber(ARGV[3])
local holder = redis.call('HGET', KEYS[1], 'lease_holder')
local expires = tonumber(redis.call('HGET', KEYS[1], 'lease_expires_at') or '0')
if holder and holder ~= '' and holder ~= ARGV[1] and expires > now then
  return 'conflict'
end
redis.call('HSET', KEYS[1], 'lease_holder', ARGV[1], 'lease_expires_at', tostring(now + tonumber(ARGV[2])))
return 'acquired'
`;

/**
 * KEYS: job hash
 * ARGV: holder, ttl ms, now ms
 */
export const RENEW_LEASE_SCRIPT = `
local now = tonumber(ARGV[3])
local holder = redis.call('HGET', KEYS[1], 'lease_holder')
local expires = tonumber(redis.call('HGET', KEYS[1], 'lease_expires_at') or '0')
if holder ~= ARGV[1] or expires <= now then return 0 end
redis.call('HSET', KEYS[1], 'lease_expires_at', tostring(now + tonumber(ARGV[2])))
return 1
`;

/**
 * KEYS: job hash
 * ARGV: holder
 */
export const RELEASE_LEASE_SCRIPT = `
if redis.call('HGET', KEYS[1], 'lease_holder') == ARGV[1] then
  redis.call('HDEL', KEYS[1], 'lease_holder', 'lease_expires_at')
  return 1
end
return 0
`;

/** Index of the first serialized output in the commit script's ARGV. */
const COMMIT_OUTPUTS_FROM = 8;

/**
 * KEYS: job hash, outputs list, active index
 * ARGV: holder, now ms, updated_at ISO, id, status, progress, error,
 *       serialized outputs...
 *
 * An empty status, progress or error leaves that field unchanged.
 */
export const COMMIT_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 0 then return 'lease_lost' end
local now = tonumber(ARGV[2])
local holder = redis.call('HGET', KEYS[1], 'lease_holder')
local expires = tonumber(redis.call('HGET', KEYS[1], 'lease_expires_at') or '0')
if holder ~= ARGV[1] or expires <= now then return 'lease_lost' end
local status = redis.call('HGET', KEYS[1], 'status')
if status == 'SUCCESS' or status == 'FAILURE' then return 'terminal' end
if ARGV[5] ~= '' then
  status = ARGV[5]
  redis.call('HSET', KEYS[1], 'status', status)
end
if ARGV[6] ~= '' then
  local current = tonumber(redis.call('HGET', KEYS[1], 'progress') or '0')
  if tonumber(ARGV[6]) > current then
    redis.call('HSET', KEYS[1], 'progress', ARGV[6])
  end
end
if ARGV[7] ~= '' then
  redis.call('HSET', KEYS[1], 'error', ARGV[7])
end
for i = ${COMMIT_OUTPUTS_FROM}, #ARGV do
  redis.call('RPUSH', KEYS[2], ARGV[i])
end
redis.call('HSET', KEYS[1], 'updated_at', ARGV[3], 'updated_at_ms', ARGV[2])
if status == 'SUCCESS' or status == 'FAILURE' then
  redis.call('ZREM', KEYS[3], ARGV[4])
else
  redis.call('ZADD', KEYS[3], ARGV[2], ARGV[4])
end
return 'ok'
`;
