export interface ExportResponseDto {
  status: 'exported' | 'empty' | 'failed';
  message: string;
  path?: string;
  tradeCount?: number;
}
