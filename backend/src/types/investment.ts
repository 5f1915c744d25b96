// src/types/investment.ts

export const INVESTMENT_STATUSES = ["active", "matured", "cancelled"] as const;
export type InvestmentStatus = (typeof INVESTMENT_STATUSES)[number];

export type RiskLevel = "low" | "medium" | "high";

export interface InvestmentType {
  id: string;
  name: string;
  description: string | null;
  risk_level: RiskLevel;
  expected_return: number | null; // percent per year
  created_at: Date;
}

export interface Investment {
  id: string;
  user_id: string;
  type_id: string;
  name: string;
  amount: number;
  current_value: number | null;
  start_date: string;
  end_date: string | null;
  interest_rate: number | null;
  institution: string | null;
  account_number: string | null;
  notes: string | null;
  status: InvestmentStatus;
  created_at: Date;
  updated_at: Date;
}

export type NewInvestment = Omit<Investment, "id" | "status" | "created_at" | "updated_at">;

export type InvestmentPatch = Partial<Pick<
  Investment,
  "name" | "amount" | "current_value" | "end_date" | "interest_rate" | "institution" | "account_number" | "notes" | "status"
>>;

export interface InvestmentFilter {
  user_id: string;
  type_id?: string;
  status?: InvestmentStatus;
  institution?: string;
  limit: number;
  offset: number;
}

export interface InvestmentRepository {
  listTypes(): Promise<InvestmentType[]>;
  findType(id: string): Promise<InvestmentType | undefined>;
  create(input: NewInvestment): Promise<Investment>;
  findById(userId: string, id: string): Promise<Investment | undefined>;
  update(userId: string, id: string, patch: InvestmentPatch): Promise<Investment | undefined>;
  remove(userId: string, id: string): Promise<boolean>;
  /** Newest start_date first. */
  list(filter: InvestmentFilter): Promise<Investment[]>;
}
