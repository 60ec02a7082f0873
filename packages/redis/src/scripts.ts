// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Lua scripts for the connection store.
 *
 * Every record lives as a JSON string in one hash (field = transport handle),
 * so each script touches a single key and runs atomically on the server.
 * The first line names the operation.
 */

export type ScriptName =
  | "upsert"
  | "get"
  | "delete"
  | "query"
  | "deactivate"
  | "purge";

// Shared scope filter. ARGV[1] is the JSON-encoded scope.
const SCOPE_FILTER = `
local scope = cjson.decode(ARGV[1])
local function inScope(rec)
  if scope.userId ~= nil and rec.userId ~= scope.userId then return false end
  if scope.path ~= nil and rec.path ~= scope.path then return false end
  if scope.active ~= nil and rec.active ~= scope.active then return false end
  if scope.lastPingBefore ~= nil and not (rec.lastPing < scope.lastPingBefore) then return false end
  if scope.excludeHandles ~= nil then
    for _, handle in ipairs(scope.excludeHandles) do
      if rec.handle == handle then return false end
    end
  end
  return true
end
`;

export const SCRIPTS: Record<ScriptName, string> = {
  // KEYS[1] hash, ARGV[1] handle, ARGV[2] fields, ARGV[3] record to create
  upsert: `-- op: upsert
local current = redis.call('HGET', KEYS[1], ARGV[1])
local rec
if current then
  rec = cjson.decode(current)
else
  rec = cjson.decode(ARGV[3])
end
for key, value in pairs(cjson.decode(ARGV[2])) do
  rec[key] = value
end
local encoded = cjson.encode(rec)
redis.call('HSET', KEYS[1], ARGV[1], encoded)
return encoded
`,

  // KEYS[1] hash, ARGV[1] handle
  get: `-- op: get
return redis.call('HGET', KEYS[1], ARGV[1])
`,

  // KEYS[1] hash, ARGV[1] handle
  delete: `-- op: delete
local current = redis.call('HGET', KEYS[1], ARGV[1])
if current then
  redis.call('HDEL', KEYS[1], ARGV[1])
end
return current
`,

  // KEYS[1] hash; filtering happens client-side
  query: `-- op: query
return redis.call('HVALS', KEYS[1])
`,

  // KEYS[1] hash, ARGV[1] scope
  deactivate: `-- op: deactivate
${SCOPE_FILTER}
local flipped = {}
local values = redis.call('HVALS', KEYS[1])
for _, value in ipairs(values) do
  local rec = cjson.decode(value)
  if rec.active == true and inScope(rec) then
    rec.active = false
    local encoded = cjson.encode(rec)
    redis.call('HSET', KEYS[1], rec.handle, encoded)
    table.insert(flipped, encoded)
  end
end
return flipped
`,

  // KEYS[1] hash, ARGV[1] scope (always carries lastPingBefore)
  purge: `-- op: purge
${SCOPE_FILTER}
local deleted = 0
local values = redis.call('HVALS', KEYS[1])
for _, value in ipairs(values) do
  local rec = cjson.decode(value)
  if rec.active == false and inScope(rec) then
    redis.call('HDEL', KEYS[1], rec.handle)
    deleted = deleted + 1
  end
end
return deleted
`,
};
