'use strict'
import path from 'path'
import Database from 'better-sqlite3'
import ExcelJS from 'exceljs'
import { z } from 'zod'

import fileSys from './fileSys.js'

import type { HistoryEntry } from '../interfaces/setting.js'

export interface HistoryStore {
  isDownloaded(bvid: string): boolean
  save(entry: HistoryEntry): void
}

const TABLE = 'history_entries'

const COLUMNS = ['author', 'title', 'keyword', 'tags', 'file_name']

export const EXPORT_SHEET = 'History'

export const EXPORT_HEADER = ['BVID', 'Author', 'Title', 'Keyword', 'Tags', 'FileName']

const columnSchema = z.array(z.object({ name: z.string() }))

const entrySchema = z.array(
  z.object({
    bvid: z.string(),
    author: z.string(),
    title: z.string(),
    keyword: z.string(),
    tags: z.string(),
    fileName: z.string(),
  }),
)

/** Videos that were downloaded and merged, one row per bvid. */
export default class History implements HistoryStore {
  db: Database.Database

  constructor(dsn: string) {
    this.db = new Database(dsn)
    this.migrate()
  }

  migrate() {
    this.db.exec(`CREATE TABLE IF NOT EXISTS ${TABLE} (bvid TEXT PRIMARY KEY)`)

    const existing = new Set(columnSchema.parse(this.db.prepare(`PRAGMA table_info(${TABLE})`).all()).map((c) => c.name))
    for (const column of COLUMNS) {
      if (existing.has(column)) continue
      this.db.exec(`ALTER TABLE ${TABLE} ADD COLUMN ${column} TEXT NOT NULL DEFAULT ''`)
    }
  }

  isDownloaded(bvid: string) {
    const row = this.db.prepare(`SELECT 1 FROM ${TABLE} WHERE bvid = ?`).get(bvid)
    return row !== undefined
  }

  save(entry: HistoryEntry) {
    this.db
      .prepare(
        `INSERT INTO ${TABLE} (bvid, author, title, keyword, tags, file_name)
         VALUES (@bvid, @author, @title, @keyword, @tags, @fileName)
         ON CONFLICT(bvid) DO UPDATE SET
           author = excluded.author,
           title = excluded.title,
           keyword = excluded.keyword,
           tags = excluded.tags,
           file_name = excluded.file_name`,
      )
      .run(entry)
  }

  all(): HistoryEntry[] {
    const rows = this.db.prepare(`SELECT bvid, author, title, keyword, tags, file_name AS fileName FROM ${TABLE} ORDER BY rowid`).all()
    return entrySchema.parse(rows)
  }

  /** One `History` sheet: a header row, then one row per entry. */
  async exportExcel(filePath: string) {
    const entries = this.all()

    const workbook = new ExcelJS.Workbook()
    const sheet = workbook.addWorksheet(EXPORT_SHEET)
    sheet.addRow(EXPORT_HEADER)
    for (const { bvid, author, title, keyword, tags, fileName } of entries) {
      sheet.addRow([bvid, author, title, keyword, tags, fileName])
    }

    await fileSys.makeDirIfNotExist(path.dirname(filePath))
    await workbook.xlsx.writeFile(filePath)
    return entries.length
  }

  close() {
    this.db.close()
  }
}
