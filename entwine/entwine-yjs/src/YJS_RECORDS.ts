export const YJS_RECORDS = {
  records: "records",
  recordFields: {
    type: "__type__",
    data: "data",
  },
} as const;
