/**
 * Deterministic JSON text.
 *
 * Plain objects reorder integer-like keys ahead of the rest, which would
 * break header order for columns such as "2024" or "1". OrderedObject keeps
 * its entries exactly as given.
 */

export type JsonNode =
  | string
  | number
  | boolean
  | null
  | readonly JsonNode[]
  | OrderedObject;

export class OrderedObject {
  constructor(readonly entries: ReadonlyArray<readonly [string, JsonNode]>) {}

  /**
   * Pair keys with values, padding missing values with ''. A repeated key
   * stays where it first appeared and takes the last value.
   */
  static from(keys: readonly string[], values: readonly JsonNode[]): OrderedObject {
    const merged = new Map<string, JsonNode>();
    keys.forEach((key, index) => {
      merged.set(key, values[index] ?? '');
    });
    return new OrderedObject(Array.from(merged));
  }
}

/**
 * Convert a plain value tree into nodes, keeping OrderedObjects as they are.
 * Undefined object members are skipped as JSON.stringify does.
 */
export function toJsonNode(value: unknown): JsonNode {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  if (value instanceof OrderedObject) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toJsonNode(item));
  }
  if (typeof value === 'object') {
    return new OrderedObject(
      Object.entries(value)
        .filter(([, item]) => item !== undefined)
        .map(([key, item]): [string, JsonNode] => [key, toJsonNode(item)])
    );
  }
  return null;
}

function isNodeList(node: JsonNode): node is readonly JsonNode[] {
  return Array.isArray(node);
}

function writeNode(node: JsonNode, unit: string | null, depth: number): string {
  let open: string;
  let close: string;
  let items: string[];
  if (isNodeList(node)) {
    open = '[';
    close = ']';
    items = node.map((value) => writeNode(value, unit, depth + 1));
  } else if (node instanceof OrderedObject) {
    open = '{';
    close = '}';
    const separator = unit === null ? ':' : ': ';
    items = node.entries.map(
      ([key, value]) =>
        `${JSON.stringify(key)}${separator}${writeNode(value, unit, depth + 1)}`
    );
  } else {
    return JSON.stringify(node);
  }

  if (items.length === 0) {
    return open + close;
  }
  if (unit === null) {
    return open + items.join(',') + close;
  }

  const inner = '\n' + unit.repeat(depth + 1);
  return open + inner + items.join(',' + inner) + '\n' + unit.repeat(depth) + close;
}

/**
 * Serialize `node`. `indent` null gives compact output; any width, 0
 * included, puts each item on its own line indented by that many spaces.
 */
export function writeJson(node: JsonNode, indent: number | null = null): string {
  return writeNode(node, indent === null ? null : ' '.repeat(indent), 0);
}
