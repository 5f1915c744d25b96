// src/db/investments.ts
import { q } from "./index";
import { SQL } from "./sql";
import type {
  Investment, InvestmentFilter, InvestmentPatch, InvestmentRepository, InvestmentType, NewInvestment
} from "../types/investment";

export class PgInvestmentRepository implements InvestmentRepository {
  async listTypes(): Promise<InvestmentType[]> {
    const { rows } = await q<InvestmentType>(SQL.investmentTypes);
    return rows;
  }

  async findType(id: string): Promise<InvestmentType | undefined> {
    const { rows } = await q<InvestmentType>(SQL.investmentTypeById, [id]);
    return rows[0];
  }

  async create(input: NewInvestment): Promise<Investment> {
    const { rows } = await q<Investment>(SQL.insertInvestment, [
      input.user_id, input.type_id, input.name, input.amount, input.current_value,
      input.start_date, input.end_date, input.interest_rate, input.institution,
      input.account_number, input.notes
    ]);
    return rows[0];
  }

  async findById(userId: string, id: string): Promise<Investment | undefined> {
    const { rows } = await q<Investment>(SQL.investmentById, [id, userId]);
    return rows[0];
  }

  async update(userId: string, id: string, patch: InvestmentPatch): Promise<Investment | undefined> {
    const { rows } = await q<Investment>(SQL.updateInvestment, [
      id, userId,
      patch.name ?? null, patch.amount ?? null, patch.current_value ?? null, patch.end_date ?? null,
      patch.interest_rate ?? null, patch.institution ?? null, patch.account_number ?? null,
      patch.notes ?? null, patch.status ?? null
    ]);
    return rows[0];
  }

  async remove(userId: string, id: string): Promise<boolean> {
    const { rows } = await q(SQL.deleteInvestment, [id, userId]);
    return rows.length > 0;
  }

  async list(filter: InvestmentFilter): Promise<Investment[]> {
    const params: unknown[] = [filter.user_id];
    let where = "WHERE user_id=$1 ";
    if (filter.type_id)     { params.push(filter.type_id);           where += `AND type_id=$${params.length} `; }
    if (filter.status)      { params.push(filter.status);            where += `AND status=$${params.length} `; }
    if (filter.institution) { params.push(`%${filter.institution}%`); where += `AND institution ILIKE $${params.length} `; }
    params.push(filter.limit, filter.offset);

    const { rows } = await q<Investment>(`
      SELECT ${SQL.investmentColumns} FROM investments
      ${where}
      ORDER BY start_date DESC, created_at DESC, id DESC
      LIMIT $${params.length - 1} OFFSET $${params.length}
    `, params);
    return rows;
  }
}
