// src/db/sql.ts (parameterized query snippets)
const USER_COLUMNS = `
  id, email, password_hash, first_name, last_name, phone,
  to_char(date_of_birth, 'YYYY-MM-DD') AS date_of_birth,
  created_at, updated_at, is_active, last_login`;

// DECIMAL comes back from pg as text; cast to float8 for plain numbers
const EXPENSE_COLUMNS = `
  id, user_id, category_id, amount::float8 AS amount, description,
  to_char(expense_date, 'YYYY-MM-DD') AS expense_date,
  payment_method, location, receipt_url, tags, created_at, updated_at`;

const GOAL_COLUMNS = `
  id, user_id, name, description,
  target_amount::float8 AS target_amount, current_amount::float8 AS current_amount,
  to_char(target_date, 'YYYY-MM-DD') AS target_date,
  goal_type, priority, status, created_at, updated_at`;

const CONTRIBUTION_COLUMNS = `
  id, goal_id, amount::float8 AS amount,
  to_char(contribution_date, 'YYYY-MM-DD') AS contribution_date,
  source, notes, created_at`;

const INVESTMENT_COLUMNS = `
  id, user_id, type_id, name, amount::float8 AS amount, current_value::float8 AS current_value,
  to_char(start_date, 'YYYY-MM-DD') AS start_date, to_char(end_date, 'YYYY-MM-DD') AS end_date,
  interest_rate::float8 AS interest_rate, institution, account_number, notes, status,
  created_at, updated_at`;

export const SQL = {
  insertUser: `
    INSERT INTO users (email, password_hash, first_name, last_name, phone, date_of_birth)
    VALUES ($1, $2, $3, $4, $5, $6::date)
    RETURNING ${USER_COLUMNS};
  `,
  userById: `SELECT ${USER_COLUMNS} FROM users WHERE id=$1;`,
  userByEmail: `SELECT ${USER_COLUMNS} FROM users WHERE email=$1;`,

  // COALESCE keeps names the patch leaves out; phone/date_of_birth take a flag since null clears them
  updateUser: `
    UPDATE users SET
      first_name    = COALESCE($2, first_name),
      last_name     = COALESCE($3, last_name),
      phone         = CASE WHEN $4::boolean THEN $5 ELSE phone END,
      date_of_birth = CASE WHEN $6::boolean THEN $7::date ELSE date_of_birth END,
      updated_at    = now()
    WHERE id=$1
    RETURNING ${USER_COLUMNS};
  `,
  touchLastLogin: `UPDATE users SET last_login = now() WHERE id=$1;`,

  // Keyset page, newest first
  listUsers: `
    SELECT ${USER_COLUMNS} FROM users
    ORDER BY created_at DESC, id DESC
    LIMIT $1;
  `,
  listUsersAfter: `
    SELECT ${USER_COLUMNS} FROM users
    WHERE (created_at, id) < ($2::timestamptz, $3::uuid)
    ORDER BY created_at DESC, id DESC
    LIMIT $1;
  `,

  // ---- expenses ----
  expenseCategories: `
    SELECT id, name, description, color, icon, created_at, updated_at
    FROM expense_categories ORDER BY name;
  `,
  expenseCategoryById: `
    SELECT id, name, description, color, icon, created_at, updated_at
    FROM expense_categories WHERE id=$1;
  `,
  insertExpense: `
    INSERT INTO expenses (user_id, category_id, amount, description, expense_date, payment_method, location, receipt_url, tags)
    VALUES ($1, $2, $3, $4, $5::date, $6, $7, $8, $9)
    RETURNING ${EXPENSE_COLUMNS};
  `,
  expenseById: `SELECT ${EXPENSE_COLUMNS} FROM expenses WHERE id=$1 AND user_id=$2;`,
  updateExpense: `
    UPDATE expenses SET
      category_id    = COALESCE($3, category_id),
      amount         = COALESCE($4, amount),
      description    = COALESCE($5, description),
      expense_date   = COALESCE($6::date, expense_date),
      payment_method = COALESCE($7, payment_method),
      location       = COALESCE($8, location),
      receipt_url    = COALESCE($9, receipt_url),
      tags           = COALESCE($10, tags),
      updated_at     = now()
    WHERE id=$1 AND user_id=$2
    RETURNING ${EXPENSE_COLUMNS};
  `,
  deleteExpense: `DELETE FROM expenses WHERE id=$1 AND user_id=$2 RETURNING id;`,
  expenseColumns: EXPENSE_COLUMNS,

  // ---- goals ----
  insertGoal: `
    INSERT INTO financial_goals (user_id, name, description, target_amount, target_date, goal_type, priority)
    VALUES ($1, $2, $3, $4, $5::date, $6, $7)
    RETURNING ${GOAL_COLUMNS};
  `,
  goalById: `SELECT ${GOAL_COLUMNS} FROM financial_goals WHERE id=$1 AND user_id=$2;`,
  updateGoal: `
    UPDATE financial_goals SET
      name          = COALESCE($3, name),
      description   = COALESCE($4, description),
      target_amount = COALESCE($5, target_amount),
      target_date   = COALESCE($6::date, target_date),
      goal_type     = COALESCE($7, goal_type),
      priority      = COALESCE($8, priority),
      status        = COALESCE($9, status),
      updated_at    = now()
    WHERE id=$1 AND user_id=$2
    RETURNING ${GOAL_COLUMNS};
  `,
  deleteGoal: `DELETE FROM financial_goals WHERE id=$1 AND user_id=$2 RETURNING id;`,
  goalColumns: GOAL_COLUMNS,

  // one statement: the contribution only lands if the goal is the user's, and the total moves with it
  insertContribution: `
    WITH c AS (
      INSERT INTO goal_contributions (goal_id, amount, contribution_date, source, notes)
      SELECT g.id, $3, $4::date, $5, $6 FROM financial_goals g WHERE g.id=$1 AND g.user_id=$2
      RETURNING *
    ), bump AS (
      UPDATE financial_goals SET current_amount = current_amount + c.amount, updated_at = now()
      FROM c WHERE financial_goals.id = c.goal_id
    )
    SELECT ${CONTRIBUTION_COLUMNS} FROM c;
  `,
  contributionsByGoal: `
    SELECT ${CONTRIBUTION_COLUMNS} FROM goal_contributions
    WHERE goal_id = (SELECT id FROM financial_goals WHERE id=$1 AND user_id=$2)
    ORDER BY contribution_date DESC, created_at DESC;
  `,

  // ---- investments ----
  investmentTypes: `
    SELECT id, name, description, risk_level, expected_return::float8 AS expected_return, created_at
    FROM investment_types ORDER BY name;
  `,
  investmentTypeById: `
    SELECT id, name, description, risk_level, expected_return::float8 AS expected_return, created_at
    FROM investment_types WHERE id=$1;
  `,
  insertInvestment: `
    INSERT INTO investments (user_id, type_id, name, amount, current_value, start_date, end_date,
                             interest_rate, institution, account_number, notes)
    VALUES ($1, $2, $3, $4, $5, $6::date, $7::date, $8, $9, $10, $11)
    RETURNING ${INVESTMENT_COLUMNS};
  `,
  investmentById: `SELECT ${INVESTMENT_COLUMNS} FROM investments WHERE id=$1 AND user_id=$2;`,
  updateInvestment: `
    UPDATE investments SET
      name           = COALESCE($3, name),
      amount         = COALESCE($4, amount),
      current_value  = COALESCE($5, current_value),
      end_date       = COALESCE($6::date, end_date),
      interest_rate  = COALESCE($7, interest_rate),
      institution    = COALESCE($8, institution),
      account_number = COALESCE($9, account_number),
      notes          = COALESCE($10, notes),
      status         = COALESCE($11, status),
      updated_at     = now()
    WHERE id=$1 AND user_id=$2
    RETURNING ${INVESTMENT_COLUMNS};
  `,
  deleteInvestment: `DELETE FROM investments WHERE id=$1 AND user_id=$2 RETURNING id;`,
  investmentColumns: INVESTMENT_COLUMNS
};
