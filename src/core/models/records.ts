/**
 * Extraction Records
 *
 * Intermediate, per-file output of the syntax extractor. Records hold only
 * what was read from source; signatures are derived later by the assembler.
 *
 * @module
 */

export interface ParameterRecord {
  identifier: string;
  type: string | null;
  /** 1-indexed */
  line: number;
  /** 1-indexed */
  column: number;
}

export interface CallableRecord {
  identifier: string;
  parameters: ParameterRecord[];
  /** Decorator texts (including `@`) in source order */
  decorators: string[];
  returnType: string | null;
  body: string;
}

export interface FieldRecord {
  identifier: string;
  type: string | null;
}

export interface ClassRecord {
  identifier: string;
  superclasses: string[];
  fields: FieldRecord[];
  methods: CallableRecord[];
}

export interface ModuleRecord {
  /** Relative, `/`-separated */
  filePath: string;
  functions: CallableRecord[];
  classes: ClassRecord[];
}
