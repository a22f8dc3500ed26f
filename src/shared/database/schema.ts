/**
 * =============================================================================
 * DATABASE SCHEMA (PostgreSQL, drizzle-orm)
 * =============================================================================
 *
 * Source of truth for the tables. Migrations in /drizzle are generated from
 * this file with `npm run db:generate` and applied with `npm run db:migrate`.
 * =============================================================================
 */

import {
  pgTable,
  serial,
  integer,
  varchar,
  text,
  doublePrecision,
  bigint,
  jsonb,
  boolean,
  uuid,
  timestamp,
  uniqueIndex,
  index,
} from 'drizzle-orm/pg-core';
import type { LanguageInfo } from './repository.interface';

export const countries = pgTable('countries', {
  id: serial('id').primaryKey(),
  name: varchar('name', { length: 255 }).notNull(),
  alpha2code: varchar('alpha2code', { length: 2 }).notNull(),
  alpha3code: varchar('alpha3code', { length: 3 }).notNull().default(''),
  capital: varchar('capital', { length: 255 }).notNull().default(''),
  region: varchar('region', { length: 255 }).notNull().default(''),
  subregion: varchar('subregion', { length: 255 }).notNull().default(''),
  population: bigint('population', { mode: 'number' }).notNull().default(0),
  latitude: doublePrecision('latitude'),
  longitude: doublePrecision('longitude'),
  demonym: varchar('demonym', { length: 255 }).notNull().default(''),
  area: doublePrecision('area'),
  numericCode: varchar('numeric_code', { length: 3 }).notNull().default(''),
  flag: text('flag').notNull().default(''),
  currencies: jsonb('currencies').$type<string[]>().notNull().default([]),
  languages: jsonb('languages').$type<LanguageInfo[]>().notNull().default([]),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  alpha2Idx: uniqueIndex('countries_alpha2code_idx').on(table.alpha2code),
  nameIdx: index('countries_name_idx').on(table.name),
}));

export const cities = pgTable('cities', {
  id: serial('id').primaryKey(),
  countryId: integer('country_id').notNull().references(() => countries.id, { onDelete: 'cascade' }),
  name: varchar('name', { length: 255 }).notNull(),
  stateOrRegion: varchar('state_or_region', { length: 255 }),
  latitude: doublePrecision('latitude').notNull(),
  longitude: doublePrecision('longitude').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  countryNameIdx: uniqueIndex('cities_country_id_name_idx').on(table.countryId, table.name),
  nameIdx: index('cities_name_idx').on(table.name),
}));

export const weatherSnapshots = pgTable('weather_snapshots', {
  id: serial('id').primaryKey(),
  cityId: integer('city_id').notNull().references(() => cities.id, { onDelete: 'cascade' }),
  observedAt: timestamp('observed_at', { withTimezone: true }).notNull(),
  temperature: doublePrecision('temperature').notNull(),
  pressure: integer('pressure').notNull(),
  humidity: integer('humidity').notNull(),
  windSpeed: doublePrecision('wind_speed').notNull(),
  description: varchar('description', { length: 255 }).notNull(),
  visibility: integer('visibility').notNull(),
  timezoneOffset: integer('timezone_offset').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  cityObservedIdx: index('weather_snapshots_city_id_observed_at_idx').on(table.cityId, table.observedAt),
}));

export const newsArticles = pgTable('news_articles', {
  id: serial('id').primaryKey(),
  countryId: integer('country_id').notNull().references(() => countries.id, { onDelete: 'cascade' }),
  source: varchar('source', { length: 255 }).notNull(),
  author: varchar('author', { length: 255 }).notNull().default(''),
  title: text('title').notNull(),
  description: text('description').notNull().default(''),
  url: text('url').notNull().default(''),
  publishedAt: timestamp('published_at', { withTimezone: true }).notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  countryPublishedIdx: index('news_articles_country_id_published_at_idx').on(table.countryId, table.publishedAt),
}));

export const adminUsers = pgTable('admin_users', {
  id: uuid('id').primaryKey(),
  username: varchar('username', { length: 50 }).notNull(),
  passwordHash: text('password_hash').notNull(),
  isSuperuser: boolean('is_superuser').notNull().default(false),
  isActive: boolean('is_active').notNull().default(true),
  lastLoginAt: timestamp('last_login_at', { withTimezone: true }),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  usernameIdx: uniqueIndex('admin_users_username_idx').on(table.username),
}));

export type CountryRow = typeof countries.$inferSelect;
export type CityRow = typeof cities.$inferSelect;
export type WeatherSnapshotRow = typeof weatherSnapshots.$inferSelect;
export type NewsArticleRow = typeof newsArticles.$inferSelect;
export type AdminUserRow = typeof adminUsers.$inferSelect;
