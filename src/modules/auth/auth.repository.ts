/**
 * Auth Repository
 * ===============
 * DB access for user accounts (PostgreSQL `users` table).
 */

import type { Pool } from "pg";

import { ConflictError } from "../../shared/errors.js";

export type UserRecord = {
  id: string;
  email: string;
  username: string;
  firstName: string;
  lastName: string;
  passwordHash: string;
  isVerified: boolean;
  role: string;
  createdAt: Date;
  updatedAt: Date;
};

export type CreateUserInput = {
  email: string;
  username: string;
  firstName: string;
  lastName: string;
  passwordHash: string;
  role?: string;
};

export type UserUpdate = Partial<Pick<UserRecord, "passwordHash" | "isVerified" | "role">>;

export interface UserRepository {
  findByEmail(email: string): Promise<UserRecord | null>;
  findById(id: string): Promise<UserRecord | null>;
  /** Throws ConflictError when the email is taken. */
  create(input: CreateUserInput): Promise<UserRecord>;
  update(id: string, patch: UserUpdate): Promise<UserRecord | null>;
}

export function normalizeEmail(email: string): string {
  return String(email || "").trim().toLowerCase();
}

type UserRow = {
  uid: string;
  email: string;
  username: string;
  first_name: string;
  last_name: string;
  password_hash: string;
  is_verified: boolean;
  role: string;
  created_at: Date;
  updated_at: Date;
};

const USER_COLUMNS =
  "uid, email, username, first_name, last_name, password_hash, is_verified, role, created_at, updated_at";

const UPDATE_COLUMNS: Array<[keyof UserUpdate, string]> = [
  ["passwordHash", "password_hash"],
  ["isVerified", "is_verified"],
  ["role", "role"],
];

const UNIQUE_VIOLATION = "23505";
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

function toUserRecord(row: UserRow): UserRecord {
  return {
    id: row.uid,
    email: row.email,
    username: row.username,
    firstName: row.first_name,
    lastName: row.last_name,
    passwordHash: row.password_hash,
    isVerified: row.is_verified,
    role: row.role,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function isUniqueViolation(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === UNIQUE_VIOLATION;
}

export function createPgUserRepository(pool: Pool): UserRepository {
  async function findByEmail(email: string): Promise<UserRecord | null> {
    const normalized = normalizeEmail(email);
    if (!normalized) {return null;}

    const { rows } = await pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`,
      [normalized]
    );
    return rows[0] ? toUserRecord(rows[0]) : null;
  }

  async function findById(id: string): Promise<UserRecord | null> {
    // Not a uuid: postgres would reject the cast, and no such user can exist.
    if (!UUID_PATTERN.test(id)) {return null;}

    const { rows } = await pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE uid = $1`,
      [id]
    );
    return rows[0] ? toUserRecord(rows[0]) : null;
  }

  async function create(input: CreateUserInput): Promise<UserRecord> {
    try {
      const { rows } = await pool.query<UserRow>(
        `INSERT INTO users (email, username, first_name, last_name, password_hash, role)
         VALUES ($1, $2, $3, $4, $5, $6)
         RETURNING ${USER_COLUMNS}`,
        [
          normalizeEmail(input.email),
          input.username,
          input.firstName,
          input.lastName,
          input.passwordHash,
          input.role ?? "user",
        ]
      );
      const row = rows[0];
      if (!row) {throw new Error("INSERT INTO users returned no row");}
      return toUserRecord(row);
    } catch (err: unknown) {
      if (isUniqueViolation(err)) {
        throw new ConflictError("User with this email already exists");
      }
      throw err;
    }
  }

  async function update(id: string, patch: UserUpdate): Promise<UserRecord | null> {
    const sets: string[] = [];
    const values: unknown[] = [];
    for (const [key, column] of UPDATE_COLUMNS) {
      const value = patch[key];
      if (value === undefined) {continue;}
      values.push(value);
      sets.push(`${column} = $${values.length}`);
    }
    if (sets.length === 0) {return await findById(id);}
    if (!UUID_PATTERN.test(id)) {return null;}

    values.push(id);
    const { rows } = await pool.query<UserRow>(
      `UPDATE users SET ${sets.join(", ")}, updated_at = now()
       WHERE uid = $${values.length}
       RETURNING ${USER_COLUMNS}`,
      values
    );
    return rows[0] ? toUserRecord(rows[0]) : null;
  }

  return { findByEmail, findById, create, update };
}
