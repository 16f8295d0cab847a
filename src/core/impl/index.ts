export { DelimiterTokenizer, DEFAULT_DELIMITER } from "./delimiterTokenizer.js";
export { PhraseCounts } from "./phraseCounts.js";
export { FileSplitter, DEFAULT_BUFFER_SIZE, planSplits, splitFileName } from "./fileSplitter.js";
export { LineAggregator } from "./lineAggregator.js";
export { MinHeapTopKSelector } from "./minHeapTopK.js";
export { SortTopKSelector } from "./sortTopK.js";
export { selectTopPhrases, compareRanked, DEFAULT_LIMIT, type Ranked } from "./topPhrases.js";
export { FileOutputWriter, renderResult } from "./fileOutputWriter.js";
