/**
 * Basic Usage Example
 *
 * Maps article records to search documents, indexes them into the
 * in-memory backend, then reindexes to sweep articles that were removed.
 * Run with: npx tsx examples/basic-usage.ts
 */

import {
  attr,
  computed,
  createReindexer,
  defineIndexer,
  logger,
  MemorySearchBackend,
  BatchIndexer,
  type RecordSource,
} from "@searchmap/sdk";

class Author {
  constructor(
    readonly first: string,
    readonly last: string
  ) {}

  fullName(): string {
    return `${this.first} ${this.last}`;
  }
}

interface Article {
  id: string;
  title: string;
  body: string;
  author: Author | null;
  tags: string[];
}

const articles = defineIndexer<Article>({
  name: "articles",
  config: { type: "article" },
  fields: {
    id: attr("id"),
    title: attr("title"),
    author_s: attr("author.fullName", { optional: true }),
    tags_ss: attr("tags", { optional: true }),
    words_i: computed(),
  },
  hooks: {
    words: (article) => article.body.split(/\s+/).filter(Boolean).length,
  },
});

async function main() {
  logger.setEnabled(false);

  const backend = new MemorySearchBackend({
    uniqueKey: "id",
    fields: [
      { name: "id", type: "string", required: true },
      { name: "title", type: "text" },
    ],
    dynamicFields: [
      { pattern: "*_s", type: "string" },
      { pattern: "*_i", type: "int" },
      { pattern: "*_dt", type: "date" },
      { pattern: "*_ss", type: "string", multiValued: true },
    ],
  });

  const catalog: Article[] = [
    {
      id: "a-1",
      title: "Mapping records",
      body: "Fields come from attribute paths",
      author: new Author("Ada", "Byron"),
      tags: ["guide"],
    },
    { id: "a-2", title: "Computed fields", body: "Hooks fill the rest", author: null, tags: [] },
    { id: "a-3", title: "Retired article", body: "Soon gone", author: null, tags: ["old"] },
  ];

  // Single writes
  console.log("✏️  Indexing articles...");
  const indexer = new BatchIndexer(articles, backend);
  await indexer.add(catalog);
  console.log(`✅ ${backend.count()} documents indexed`);
  console.log(backend.get("a-1"));

  // Full reindex after a record disappears from the catalog
  console.log("\n🔁 Reindexing without a-3...");
  catalog.pop();
  const source: RecordSource<Article> = { getRecords: () => catalog };
  const reindexer = createReindexer(articles, backend, source, { commitChunkSize: 1 });
  const indexed = await reindexer.reindex();

  console.log(`✅ Reindexed ${indexed} articles in ${reindexer.lastSummary?.chunks ?? 0} chunk(s)`);
  console.log(`   Remaining ids: ${backend.all().map((doc) => String(doc.id)).join(", ")}`);
}

main().catch(console.error);
