/**
 * Expression builders for the writes issued by the persistence bridge.
 *
 * Every attribute name is aliased (`#n0`, `#n1`, ...) and every value gets a
 * placeholder (`:v0`, ...), so stored names never clash with DynamoDB's
 * reserved words and may contain any character.
 */

/** Compiled expression parts ready for an adapter call. */
export interface CompiledExpression {
  readonly expression: string;
  readonly expressionAttributeNames: Record<string, string>;
  readonly expressionAttributeValues: Record<string, unknown>;
}

/** Attribute changes to apply to an existing item, keyed by stored name. */
export interface UpdateActions {
  readonly sets: Readonly<Record<string, unknown>>;
  readonly removes: readonly string[];
}

const createAliases = () => {
  const names: Record<string, string> = {};
  const values: Record<string, unknown> = {};
  let nameCount = 0;
  let valueCount = 0;

  return {
    names,
    values,
    name: (attribute: string): string => {
      const alias = `#n${nameCount++}`;
      names[alias] = attribute;
      return alias;
    },
    value: (value: unknown): string => {
      const placeholder = `:v${valueCount++}`;
      values[placeholder] = value;
      return placeholder;
    },
  };
};

/**
 * Compiles SET / REMOVE actions into an UpdateExpression.
 *
 * @returns `undefined` when there is nothing to update
 *
 * @example
 * ```ts
 * compileUpdate({ sets: { city: "Chicago" }, removes: ["zip"] });
 * // {
 * //   expression: "SET #n0 = :v0 REMOVE #n1",
 * //   expressionAttributeNames: { "#n0": "city", "#n1": "zip" },
 * //   expressionAttributeValues: { ":v0": "Chicago" },
 * // }
 * ```
 */
export const compileUpdate = (actions: UpdateActions): CompiledExpression | undefined => {
  const aliases = createAliases();
  const clauses: string[] = [];

  const setParts = Object.entries(actions.sets).map(
    ([attribute, value]) => `${aliases.name(attribute)} = ${aliases.value(value)}`,
  );
  if (setParts.length > 0) clauses.push(`SET ${setParts.join(", ")}`);

  const removeParts = actions.removes.map((attribute) => aliases.name(attribute));
  if (removeParts.length > 0) clauses.push(`REMOVE ${removeParts.join(", ")}`);

  if (clauses.length === 0) return undefined;

  return Object.freeze({
    expression: clauses.join(" "),
    expressionAttributeNames: Object.freeze(aliases.names),
    expressionAttributeValues: Object.freeze(aliases.values),
  });
};

/** Condition that holds only when no item with the given key attribute exists. */
export const attributeNotExists = (attribute: string): CompiledExpression =>
  Object.freeze({
    expression: "attribute_not_exists(#key)",
    expressionAttributeNames: Object.freeze({ "#key": attribute }),
    expressionAttributeValues: Object.freeze({}),
  });

/** Condition that holds only when an item with the given key attribute exists. */
export const attributeExists = (attribute: string): CompiledExpression =>
  Object.freeze({
    expression: "attribute_exists(#key)",
    expressionAttributeNames: Object.freeze({ "#key": attribute }),
    expressionAttributeValues: Object.freeze({}),
  });
