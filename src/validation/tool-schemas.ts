import { z } from 'zod';

// Argument shapes only. Option semantics (orient, delimiter, encoding,
// ranges) are checked by parseConversionOptions so there is one source of
// truth for them.

const ShapeOptionsShape = {
  delimiter: z
    .string()
    .optional()
    .describe('CSV delimiter, default ","; e.g. "\\t" or ";"'),
  skip_rows: z
    .number()
    .optional()
    .describe('Number of leading rows to skip, default 0'),
  header: z
    .boolean()
    .optional()
    .describe('Whether the first retained row is a header, default true'),
  orient: z
    .string()
    .optional()
    .describe('Output shape: "records" (default), "values" or "split"'),
  indent: z
    .number()
    .nullable()
    .optional()
    .describe('Indentation width for pretty-printing; null for compact'),
};

// 1. convert_csv_file
export const ConvertCsvFileSchema = z.object({
  file_path: z.string().min(1).describe('Path to the CSV file'),
  output_file_path: z
    .string()
    .min(1)
    .nullable()
    .optional()
    .describe('Output JSON path; defaults to the CSV path with a .json extension'),
  encoding: z.string().optional().describe('File encoding, default "utf-8"'),
  ...ShapeOptionsShape,
});

// 2. convert_csv_string
export const ConvertCsvStringSchema = z.object({
  csv_content: z.string().describe('CSV text to convert'),
  ...ShapeOptionsShape,
});

// 3. convert_csv_file_to_string
export const ConvertCsvFileToStringSchema = z.object({
  file_path: z.string().min(1).describe('Path to the CSV file'),
  encoding: z.string().optional().describe('File encoding, default "utf-8"'),
  ...ShapeOptionsShape,
});

// 4. get_csv_info
export const GetCsvInfoSchema = z.object({
  file_path: z.string().min(1).describe('Path to the CSV file'),
});

export type ConvertCsvFileArgs = z.infer<typeof ConvertCsvFileSchema>;
export type ConvertCsvStringArgs = z.infer<typeof ConvertCsvStringSchema>;
export type ConvertCsvFileToStringArgs = z.infer<typeof ConvertCsvFileToStringSchema>;
export type GetCsvInfoArgs = z.infer<typeof GetCsvInfoSchema>;
