import type { DatasetListEntry, DatasetPayload, UserProfile } from "../src/types/dataset";
import type { AppStore, DatasetRecord, UserRecord } from "./store";

export const toUserProfile = (user: UserRecord): UserProfile => ({
  id: user.id,
  username: user.username,
  email: user.email
});

export const toDatasetPayload = async (
  record: DatasetRecord,
  store: AppStore
): Promise<DatasetPayload> => {
  const uploader = record.uploadedBy === null ? null : await store.findUserById(record.uploadedBy);
  return {
    id: record.id,
    name: record.name,
    uploaded_at: record.uploadedAt,
    uploaded_by_name: uploader?.username ?? "Anonymous",
    record_count: record.rows.length,
    dropped_count: record.droppedCount,
    row_issues: record.issues,
    raw_data_parsed: record.rows,
    summary_parsed: record.summary
  };
};

export const toListEntry = (record: DatasetRecord): DatasetListEntry => ({
  id: record.id,
  name: record.name,
  uploaded_at: record.uploadedAt,
  record_count: record.rows.length,
  summary_parsed: record.summary
});
