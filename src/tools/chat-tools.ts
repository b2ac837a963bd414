import { z } from 'zod';
import type { ProgressSink } from '../core/events';
import { ToolRegistry } from './registry';
import type { TerminalResult } from './terminal';

export type ChatToolName = 'generate_presentation';

export const presentationBriefSchema = z.object({
  ppt_topic: z.string().min(1),
  ppt_description: z.string(),
  ppt_details: z.string(),
  ppt_data: z.string().optional(),
  brand_logo_details: z.string().optional(),
  brand_guideline_details: z.string().optional(),
  brand_color_details: z.string().optional()
});

export type PresentationBrief = z.infer<typeof presentationBriefSchema>;

export type GenerationResult = TerminalResult & {
  export_file?: string;
  screenshots?: string[];
  // slides the export skipped, with the reason
  export_warnings?: string[];
};

export interface PresentationGenerator {
  generate(brief: PresentationBrief, onProgress?: ProgressSink): Promise<GenerationResult>;
}

export type ChatToolDeps = {
  presentations: PresentationGenerator;
  onProgress?: ProgressSink;
  // receives every generation result of the turn, latest last
  onGenerated?: (result: GenerationResult) => void;
};

export function formatGenerationReport(result: GenerationResult): string {
  if (!result.success) {
    return `Failed to generate presentation: ${result.message}`;
  }
  const lines = [
    'Presentation generated successfully!',
    '',
    `Slides created: ${result.slide_count}`,
    `Files: ${result.slide_files.join(', ')}`,
    '',
    `Message: ${result.message}`
  ];
  lines.push('', result.export_file ? `PPTX File: ${result.export_file}` : 'PPTX File: not exported');
  if (result.export_warnings && result.export_warnings.length > 0) {
    lines.push('', 'Export warnings:', ...result.export_warnings.map((w) => `  - ${w}`));
  }
  return lines.join('\n');
}

export function createChatTools(deps: ChatToolDeps): ToolRegistry<ChatToolName> {
  return new ToolRegistry<ChatToolName>().register({
    name: 'generate_presentation',
    description:
      'Generate the HTML slides for a presentation and export them as a PowerPoint deck. ' +
      'Call this only after gathering enough detail from the user; pass everything you learned.',
    inputSchema: {
      type: 'object',
      properties: {
        ppt_topic: { type: 'string', description: 'Main topic or title of the presentation' },
        ppt_description: { type: 'string', description: 'What the presentation is about and who it is for' },
        ppt_details: { type: 'string', description: 'Outline and key points, slide by slide where known' },
        ppt_data: { type: 'string', description: 'Figures, statistics or tables to show' },
        brand_logo_details: { type: 'string', description: 'Logo description and placement' },
        brand_guideline_details: { type: 'string', description: 'Tone, fonts and visual style' },
        brand_color_details: { type: 'string', description: 'Brand colors as hex codes' }
      },
      required: [
        'ppt_topic',
        'ppt_description',
        'ppt_details',
        'ppt_data',
        'brand_logo_details',
        'brand_guideline_details',
        'brand_color_details'
      ]
    },
    input: presentationBriefSchema,
    handler: async (brief) => {
      const result = await deps.presentations.generate(brief, deps.onProgress);
      deps.onGenerated?.(result);
      return { kind: 'text', content: formatGenerationReport(result), isError: !result.success };
    }
  });
}
