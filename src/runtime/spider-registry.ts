import type { SpiderDefinition, SpiderInfo } from './types.js';

/**
 * Catalogue of spiders the runtime can launch, keyed by name.
 */
export class SpiderRegistry {
  private readonly spiders = new Map<string, SpiderDefinition>();

  constructor(spiders: readonly SpiderDefinition[] = []) {
    for (const spider of spiders) {
      this.register(spider);
    }
  }

  register(spider: SpiderDefinition): void {
    if (this.spiders.has(spider.name)) {
      throw new Error(`Spider already registered: ${spider.name}`);
    }
    this.spiders.set(spider.name, spider);
  }

  get(name: string): SpiderDefinition | undefined {
    return this.spiders.get(name);
  }

  has(name: string): boolean {
    return this.spiders.has(name);
  }

  names(): string[] {
    return Array.from(this.spiders.keys());
  }

  list(): SpiderInfo[] {
    return Array.from(this.spiders.values()).map((spider) => ({
      name: spider.name,
      description: spider.description ?? null,
      allowedDomains: [...(spider.allowedDomains ?? [])],
      startUrls: [...(spider.startUrls ?? [])],
    }));
  }
}
