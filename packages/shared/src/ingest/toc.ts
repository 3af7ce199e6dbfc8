import type { Course } from '../schemas/catalog.js';

// Page span assumed for the last chapter listed in a table of contents.
export const LAST_CHAPTER_PAGES = 30;
const MAX_PAGE_NUMBER = 2000;

const TOC_LINE_PATTERNS = [
  /(?:Chapter|CHAPTER)\s+(\d+)[.\s:].*?(\d+)\s*$/,
  /^(\d+)\s+[A-Z].*?(\d+)\s*$/,
  /^(\d+)\.\s+.*?(\d+)\s*$/,
];

interface ChapterStart {
  chapter: string;
  page: number;
}

function readChapterStarts(tocText: string): ChapterStart[] {
  const starts: ChapterStart[] = [];
  for (const rawLine of tocText.split('\n')) {
    const line = rawLine.trim();
    if (!line) continue;
    for (const pattern of TOC_LINE_PATTERNS) {
      const match = line.match(pattern);
      if (!match) continue;
      const page = Number(match[2]);
      if (page >= 1 && page <= MAX_PAGE_NUMBER) {
        starts.push({ chapter: match[1], page });
      }
      break;
    }
  }
  return starts.sort((a, b) => a.page - b.page);
}

/**
 * Page counts for the requested chapters, taken from table-of-contents text
 * as the distance to the next chapter's first page.
 */
export function pageCountsFromToc(
  tocText: string,
  chaptersNeeded: readonly string[],
): Record<string, number> {
  const starts = readChapterStarts(tocText);
  const counts: Record<string, number> = {};
  starts.forEach((start, index) => {
    if (!chaptersNeeded.includes(start.chapter) || start.chapter in counts) return;
    const next = starts[index + 1];
    counts[start.chapter] = next ? next.page - start.page : LAST_CHAPTER_PAGES;
  });
  return counts;
}

export function annotateTopicPages(course: Course, pageCounts: Record<string, number>): Course {
  const topics = course.topics.map((topic) => ({
    ...topic,
    pages: topic.chapters.reduce((sum, chapter) => sum + (pageCounts[chapter] ?? 0), 0),
  }));
  const totalPages = Object.values(pageCounts).reduce((sum, pages) => sum + pages, 0);
  return { ...course, topics, total_pages: totalPages };
}
