function str(v: string | undefined, d: string): string {
  return v && v.trim() ? v.trim() : d;
}

function bool(v: string | undefined, d = false): boolean {
  return v === 'true' ? true : v === 'false' ? false : d;
}

export const config = {
  logging: {
    level: str(process.env.VFS_CONNECT_LOG_LEVEL ?? process.env.LOG_LEVEL, 'info'),
  },

  registry: {
    // first registration wins unless duplicates are rejected outright
    rejectDuplicates: bool(process.env.VFS_CONNECT_REJECT_DUPLICATE_OPTIONS, false),
  },
};
