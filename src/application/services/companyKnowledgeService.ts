import { z } from "zod";
import { ValidationError } from "../../core/entities/appError";
import type {
  CompanyEntity,
  SimilarityMatch,
} from "../../core/entities/memory";
import type { CompanyRequest } from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  CompanyRepositoryPort,
  EmbeddingPort,
} from "../../core/ports/outboundPorts";
import type { Logger } from "../../shared/logger/logger";

const companySchema = z.object({
  symbol: z
    .string()
    .trim()
    .min(1)
    .transform((symbol) => symbol.toUpperCase()),
  name: z.string().trim().min(1),
  sector: z.string().trim().min(1).optional(),
  industry: z.string().trim().min(1).optional(),
  marketCap: z.number().nonnegative().optional(),
  fundamentals: z.record(z.unknown()).default({}),
});

export const companyEmbeddingText = (
  company: Pick<CompanyEntity, "name" | "sector" | "industry">,
): string =>
  [company.name, company.sector, company.industry]
    .filter((part) => part !== undefined)
    .join(" ");

/**
 * Keeps semantic company knowledge: display names for subjects and lookup of
 * companies resembling a free-text description.
 */
export class CompanyKnowledgeService {
  constructor(
    private readonly companies: CompanyRepositoryPort,
    private readonly embedding: EmbeddingPort,
    private readonly clock: ClockPort,
    private readonly logger: Logger,
  ) {}

  async save(request: CompanyRequest): Promise<CompanyEntity> {
    const parsed = companySchema.safeParse(request);
    if (!parsed.success) {
      throw new ValidationError(
        "Invalid company",
        parsed.error.issues.map(
          (issue) => `${issue.path.join(".") || "company"}: ${issue.message}`,
        ),
      );
    }

    const vectors = await this.embedding.embedTexts([
      companyEmbeddingText(parsed.data),
    ]);
    if (vectors.isErr()) {
      this.logger.warn(
        { symbol: parsed.data.symbol, code: vectors.error.code },
        "Company embedding failed, storing without vector",
      );
    }

    const company: CompanyEntity = {
      ...parsed.data,
      embedding: vectors.isOk() ? (vectors.value[0] ?? null) : null,
      updatedAt: this.clock.now(),
    };

    await this.companies.upsert(company);
    this.logger.info({ symbol: company.symbol }, "Company saved");
    return company;
  }

  /**
   * Empty when the description cannot be embedded.
   */
  async findSimilar(
    description: string,
    limit: number,
    minSimilarity?: number,
  ): Promise<SimilarityMatch<CompanyEntity>[]> {
    const vectors = await this.embedding.embedTexts([description]);
    if (vectors.isErr()) {
      this.logger.warn(
        { code: vectors.error.code },
        "Description embedding failed, no company matches",
      );
      return [];
    }

    const [vector] = vectors.value;
    if (!vector) {
      return [];
    }

    return this.companies.findSimilar({ embedding: vector, limit, minSimilarity });
  }
}
