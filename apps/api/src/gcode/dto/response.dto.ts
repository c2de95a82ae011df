import type { Issue, SubroutineFile } from '@toolpath/shared';

export interface ValidationResultDto {
  valid: boolean;
  errors: string[];
  issues: Issue[];
}

export interface GenerationResponseDto {
  projectName: string;
  mainProgram: string;
  subroutines: SubroutineFile[];
  warnings: string[];
}

export interface ExportResultDto {
  directory: string;
  files: string[];
  warnings: string[];
}
