/**
 * Client factory: binds models to an SDK adapter.
 */

import type { SDKAdapter } from "../adapters/adapter.js";
import { type ModelClient, createModelClient } from "../persistence/model-client.js";
import type { AttributeShape, ModelDefinition } from "../types/model.js";

/** Configuration for creating a client. */
export interface ClientConfig {
  readonly adapter: SDKAdapter;
}

/** Entry point for persistence: one {@link ModelClient} per model. */
export interface ItemFieldClient {
  readonly adapter: SDKAdapter;
  /** Creates the document operations for a model. */
  readonly model: <A extends AttributeShape>(model: ModelDefinition<A>) => ModelClient<A>;
}

/**
 * Creates a client.
 *
 * @param config - Client configuration with the SDK adapter
 * @returns A frozen {@link ItemFieldClient}
 *
 * @example
 * ```ts
 * import { createClient, defineModel } from "itemfield";
 * import { createSDKv3DocAdapter } from "itemfield/adapters/sdk-v3-doc";
 *
 * const adapter = createSDKv3DocAdapter(documentClient, commands);
 * const users = createClient({ adapter }).model(User);
 *
 * const created = await users.create({ name: "Alice", visits: "3" });
 * if (created.success) {
 *   const found = await users.find({ id: created.data.get("id") });
 * }
 * ```
 */
export const createClient = (config: ClientConfig): ItemFieldClient => {
  const { adapter } = config;
  return Object.freeze({
    adapter,
    model: <A extends AttributeShape>(model: ModelDefinition<A>) =>
      createModelClient(model, adapter),
  });
};
