export type AttributeFilter = Readonly<Record<string, string | RegExp>>;

function describeAttributes(attrs: AttributeFilter): string {
  return Object.entries(attrs)
    .map(([name, value]) => (typeof value === "string" ? `${name}="${value}"` : `${name}=${String(value)}`))
    .join(" ");
}

export class PageStructureError extends Error {
  readonly tag: string;
  readonly attrs: AttributeFilter;

  constructor(tag: string, attrs: AttributeFilter = {}, message?: string) {
    const described = describeAttributes(attrs);
    super(message ?? `Tag not found: <${tag}${described ? ` ${described}` : ""}>`);
    this.name = "PageStructureError";
    this.tag = tag;
    this.attrs = attrs;
  }
}

export class HttpRequestError extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, status?: number) {
    super(message);
    this.name = "HttpRequestError";
    this.url = url;
    this.status = status;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
