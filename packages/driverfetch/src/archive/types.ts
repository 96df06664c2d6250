export type ArchiveKind = "tar.gz" | "zip";
