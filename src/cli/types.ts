import type { JoinPolicy } from "../chunking/types";

export interface ChunkRunOptions {
  inputPath: string;
  limit: number;
  joinPolicy: JoinPolicy;
  substitutionsPath?: string | undefined;
  substitutionsHeader: boolean;
}
