import type { ChunkAnalysisRequest, ChunkAnalyzerPort } from '../../domain/ports/ChunkAnalyzerPort.js';
import type { Turn } from '../../domain/entities/Turn.js';
import { formatTimestamp } from '../../domain/value-objects/Timestamp.js';

/**
 * 離線 analyzer：解析已標記說話者的逐字稿，不呼叫 LLM
 *
 * 支援的行格式：
 * - `[HH:MM:SS] Speaker: text`
 * - `HH:MM:SS Speaker: text`
 * - `Speaker: text`
 *
 * 不符合格式的非空行視為上一個 turn 的延續。非第一個 chunk 開頭、
 * 第一個說話者行之前的片段屬於上一個 chunk 已涵蓋的 turn，直接略過。
 * 沒有時間戳的 turn 沿用前一個 turn 的時間。
 */

const TURN_LINE_RE = /^\s*(?:\[?(\d{1,3}:\d{2}:\d{2})\]?\s+)?([^:\[\]\n]{1,60}?):\s+(.*)$/;

interface DraftTurn {
  speaker: string;
  start?: string;
  text: string;
}

function normalizeTimestamp(raw: string): string {
  const [h, m, s] = raw.split(':').map(Number);
  return formatTimestamp(h * 3600 + m * 60 + s);
}

export class LineTranscriptAnalyzer implements ChunkAnalyzerPort {
  readonly providerId = 'lines';

  async analyze(request: ChunkAnalysisRequest): Promise<Turn[]> {
    const drafts = this.parseDrafts(request.text, request.chunk.startChar > 0);
    return this.toTurns(drafts);
  }

  private parseDrafts(text: string, skipLeadingFragment: boolean): DraftTurn[] {
    const drafts: DraftTurn[] = [];

    for (const line of text.split(/\r?\n/)) {
      if (!line.trim()) continue;

      const match = TURN_LINE_RE.exec(line);
      if (match) {
        drafts.push({
          speaker: match[2].trim(),
          start: match[1] ? normalizeTimestamp(match[1]) : undefined,
          text: match[3].trim(),
        });
        continue;
      }

      const last = drafts[drafts.length - 1];
      if (last) {
        last.text = `${last.text} ${line.trim()}`.trim();
      } else if (!skipLeadingFragment) {
        drafts.push({ speaker: 'Unknown', text: line.trim() });
      }
    }

    return drafts;
  }

  private toTurns(drafts: DraftTurn[]): Turn[] {
    const starts: string[] = [];
    let previous = '00:00:00';
    for (const draft of drafts) {
      previous = draft.start ?? previous;
      starts.push(previous);
    }

    return drafts.map((draft, idx): Turn => {
      const isQuestion = draft.text.endsWith('?');
      return {
        idx,
        start_ts: starts[idx],
        // 結束時間取下一個 turn 的開始時間
        end_ts: idx + 1 < starts.length ? starts[idx + 1] : starts[idx],
        speaker: draft.speaker,
        type: isQuestion ? 'question' : 'monologue',
        question_likelihood: isQuestion ? 0.9 : 0.1,
        text: draft.text,
      };
    });
  }
}
