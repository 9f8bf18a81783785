/**
 * Lua scripts for owner-verified lock operations.
 * KEYS[1] = lock key, ARGV[1] = owner token, ARGV[2] = ttl in ms (extend only)
 */

export const RELEASE_LOCK_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
else
  return 0
end
`.trim();

export const EXTEND_LOCK_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("pexpire", KEYS[1], ARGV[2])
else
  return 0
end
`.trim();
