/**
 * Run Tracker
 * Unified tracking for stats and issues
 */

import { ZodError } from "zod";
import { FetchError, type FetchErrorReason } from "../download/fetch-error";
import { AppError } from "./errors";

// ============================================================================
// Issue types
// ============================================================================

export type ImageIssueReason = FetchErrorReason;
export type StorageIssueReason = "exists" | "write-error" | "invalid-data";
export type ResourceIssueReason = "schema-validation" | "invalid-json" | "read-error";

export interface ImageIssue {
  type: "image";
  path: string;
  reason: ImageIssueReason;
  details: string;
}

export interface StorageIssue {
  type: "storage";
  path: string;
  reason: StorageIssueReason;
  details: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details: string;
}

export type Issue = ImageIssue | StorageIssue | ResourceIssue;
export type IssueType = Issue["type"];

export interface ProcessingStats {
  documents: number;
  urlsFound: number;
  downloadedImages: number;
  failedImages: number;
  downloadedBytes: number;
  storedImages: number;
  failedStores: number;
  issues: Issue[];
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues
        .map((e) => (e.path.length ? `${e.path.join(".")}: ${e.message}` : e.message))
        .join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return { reason: "invalid-json", details: error.message };
  }
  return {
    reason: "read-error",
    details: error instanceof Error ? error.message : String(error),
  };
}

function mapImageError(error: unknown): IssueInfo<ImageIssueReason> {
  if (error instanceof FetchError) {
    return { reason: error.reason, details: error.message };
  }
  return {
    reason: "network",
    details: error instanceof Error ? error.message : String(error),
  };
}

function mapStorageError(error: unknown): IssueInfo<StorageIssueReason> {
  const details = error instanceof Error ? error.message : String(error);

  if (error instanceof AppError && error.kind === "validation") {
    return { reason: "invalid-data", details };
  }
  if (details.includes("already exists")) {
    return { reason: "exists", details };
  }
  return { reason: "write-error", details };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private documents = 0;
  private urlsFound = 0;
  private downloadedImages = 0;
  private failedImages = 0;
  private downloadedBytes = 0;
  private storedImages = 0;
  private failedStores = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setDocuments(count: number): void {
    this.documents = count;
  }

  setUrlsFound(count: number): void {
    this.urlsFound = count;
  }

  incrementImagesDownloaded(bytes: number): void {
    this.downloadedImages++;
    this.downloadedBytes += bytes;
  }

  incrementImagesFailed(): void {
    this.failedImages++;
  }

  incrementImagesStored(): void {
    this.storedImages++;
  }

  incrementStoresFailed(): void {
    this.failedStores++;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackError(path: string, error: unknown, type: IssueType): void {
    switch (type) {
      case "image": {
        const { reason, details } = mapImageError(error);
        this.issues.push({ type: "image", path, reason, details });
        break;
      }
      case "storage": {
        const { reason, details } = mapStorageError(error);
        this.issues.push({ type: "storage", path, reason, details });
        break;
      }
      case "resource": {
        const { reason, details } = mapResourceError(error);
        this.issues.push({ type: "resource", path, reason, details });
        break;
      }
    }
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(): Issue[];
  getIssues<T extends IssueType>(type: T): Extract<Issue, { type: T }>[];
  getIssues(type?: IssueType): Issue[] {
    if (!type) return [...this.issues];
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): ProcessingStats {
    return {
      documents: this.documents,
      urlsFound: this.urlsFound,
      downloadedImages: this.downloadedImages,
      failedImages: this.failedImages,
      downloadedBytes: this.downloadedBytes,
      storedImages: this.storedImages,
      failedStores: this.failedStores,
      issues: [...this.issues],
      duration: Date.now() - this.startTime.getTime(),
    };
  }
}
