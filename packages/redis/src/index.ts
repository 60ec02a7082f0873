// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

export {
  redisConnectionStore,
  type RedisClient,
  type RedisConnectionStoreOptions,
} from "./store.js";
export { SCRIPTS, type ScriptName } from "./scripts.js";
