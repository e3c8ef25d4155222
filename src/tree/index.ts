export {
  DEFAULT_PRIORITY,
  QuestionTree,
  type AddQuestionOptions,
  type TreeNode,
  type TreeNodeData,
} from './question-tree.js';
export { rankUnansweredQuestions, suggestNextQuestion, type RankedQuestion } from './suggestion.js';
export { TreeRepository } from './database.js';
