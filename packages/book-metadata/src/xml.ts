export interface XmlNode {
  name: string;
  attributes: Record<string, string>;
  children: XmlNode[];
  text?: string;
}

const TEXT_NODE = "#text";
const ROOT_NODE = "#root";

const ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
};

/**
 * Tolerant tag-soup reader for OPF and container documents. Element and
 * attribute names are lower-cased; prefixes such as `dc:` are kept.
 */
export function parseXml(xml: string): XmlNode | undefined {
  const root: XmlNode = { name: ROOT_NODE, attributes: {}, children: [] };
  const stack: XmlNode[] = [root];
  const tokens = /<!\[CDATA\[([\s\S]*?)\]\]>|<!--[\s\S]*?-->|<[^>]+>|[^<]+/g;
  let match: RegExpExecArray | null;

  while ((match = tokens.exec(xml))) {
    const token = match[0];
    const parent = stack[stack.length - 1];

    if (match[1] !== undefined) {
      appendText(parent, match[1]);
      continue;
    }
    if (token.startsWith("<?") || token.startsWith("<!")) {
      continue;
    }
    if (token.startsWith("</")) {
      const name = normalizeName(token.slice(2, -1).trim());
      closeElement(stack, name);
      continue;
    }
    if (token.startsWith("<")) {
      const selfClosing = token.endsWith("/>");
      const body = token.slice(1, selfClosing ? -2 : -1).trim();
      const nameEnd = body.search(/\s/);
      const name = nameEnd < 0 ? body : body.slice(0, nameEnd);
      if (!name) continue;

      const node: XmlNode = {
        name: normalizeName(name),
        attributes: parseAttributes(nameEnd < 0 ? "" : body.slice(nameEnd)),
        children: [],
      };
      parent.children.push(node);
      if (!selfClosing) {
        stack.push(node);
      }
      continue;
    }

    appendText(parent, decodeEntities(token));
  }

  return root.children.find(child => child.name !== TEXT_NODE);
}

export function findNodes(node: XmlNode | undefined, name: string): XmlNode[] {
  if (!node) return [];
  const wanted = normalizeName(name);
  const found: XmlNode[] = [];

  const visit = (current: XmlNode) => {
    if (current.name === wanted) {
      found.push(current);
    }
    for (const child of current.children) {
      if (child.name !== TEXT_NODE) visit(child);
    }
  };

  visit(node);
  return found;
}

export function findFirst(node: XmlNode | undefined, name: string): XmlNode | undefined {
  return findNodes(node, name)[0];
}

export function childElements(node: XmlNode | undefined, name: string): XmlNode[] {
  if (!node) return [];
  const wanted = normalizeName(name);
  return node.children.filter(child => child.name === wanted);
}

export function attr(node: XmlNode | undefined, name: string): string | undefined {
  const value = node?.attributes[normalizeName(name)];
  return value === undefined || value === "" ? undefined : value;
}

/** Concatenated, whitespace-collapsed text of the node and its descendants. */
export function getText(node: XmlNode | undefined): string | undefined {
  if (!node) return undefined;
  const parts: string[] = [];
  const collect = (current: XmlNode) => {
    for (const child of current.children) {
      if (child.name === TEXT_NODE) {
        if (child.text) parts.push(child.text);
      } else {
        collect(child);
      }
    }
  };
  collect(node);
  const text = parts.join(" ").replace(/\s+/g, " ").trim();
  return text || undefined;
}

function appendText(parent: XmlNode, raw: string) {
  const text = raw.trim();
  if (!text) return;
  parent.children.push({ name: TEXT_NODE, attributes: {}, children: [], text });
}

function closeElement(stack: XmlNode[], name: string) {
  // Pop to the matching open element; stray closing tags are ignored.
  for (let i = stack.length - 1; i > 0; i -= 1) {
    if (stack[i].name === name) {
      stack.length = i;
      return;
    }
  }
}

function parseAttributes(input: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  const pattern = /([\w:.-]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(input))) {
    const [, key, doubleQuoted, singleQuoted] = match;
    attributes[normalizeName(key)] = decodeEntities(doubleQuoted ?? singleQuoted ?? "").trim();
  }
  return attributes;
}

export function decodeEntities(value: string): string {
  return value.replace(/&(#x[0-9a-f]+|#[0-9]+|[a-z]+);/gi, (whole, entity: string) => {
    if (entity[0] === "#") {
      const code = entity[1] === "x" || entity[1] === "X"
        ? Number.parseInt(entity.slice(2), 16)
        : Number.parseInt(entity.slice(1), 10);
      return Number.isFinite(code) && code <= 0x10ffff ? String.fromCodePoint(code) : whole;
    }
    return ENTITIES[entity.toLowerCase()] ?? whole;
  });
}

function normalizeName(name: string): string {
  return name.toLowerCase();
}
