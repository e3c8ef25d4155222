import { describe, it, expect } from 'vitest';
import { QuestionTree } from '../../src/tree/question-tree.js';
import { InvalidParentError, NotFoundError, ValidationError } from '../../src/utils/errors.js';

/**
 * 1 What is the project?       2 Who is the team?
 * └─ 3 What does it build?     └─ 6 Who leads it?
 *    ├─ 4 Which language?
 *    └─ 5 Which database?
 */
function sampleTree(): QuestionTree {
  const tree = new QuestionTree();
  tree.addQuestion('What is the project?');
  tree.addQuestion('Who is the team?');
  tree.addQuestion('What does it build?', 1);
  tree.addQuestion('Which language?', 3);
  tree.addQuestion('Which database?', 3);
  tree.addQuestion('Who leads it?', 2);
  return tree;
}

describe('QuestionTree.addQuestion', () => {
  it('hands out sequential ids starting at 1', () => {
    const tree = new QuestionTree();

    expect(tree.addQuestion('First?')).toBe(1);
    expect(tree.addQuestion('Second?', 1)).toBe(2);
    expect(tree.addQuestion('Third?')).toBe(3);
    expect(tree.size).toBe(3);
  });

  it('creates unanswered nodes linked to their parent', () => {
    const tree = new QuestionTree();
    const root = tree.addQuestion('  What is the project?  ', null, { metadata: { area: 'overview' } });
    const child = tree.addQuestion('What does it build?', root, { priority: 2 });

    expect(tree.getNode(root)).toEqual({
      id: 1,
      question: 'What is the project?',
      answer: null,
      metadata: { area: 'overview' },
      parentId: null,
      priority: 0,
      children: [2],
      answered: false,
    });
    expect(tree.getNode(child)?.parentId).toBe(root);
    expect(tree.getNode(child)?.priority).toBe(2);
  });

  it('rejects an unknown parent without changing the tree', () => {
    const tree = new QuestionTree();
    tree.addQuestion('Root?');

    expect(() => tree.addQuestion('Orphan?', 42)).toThrow(InvalidParentError);
    expect(tree.size).toBe(1);
    expect(tree.addQuestion('Next?')).toBe(2);
  });

  it('rejects empty questions', () => {
    expect(() => new QuestionTree().addQuestion('   ')).toThrow(ValidationError);
  });

  it('rejects non-finite priorities without changing the tree', () => {
    const tree = new QuestionTree();

    expect(() => tree.addQuestion('A?', null, { priority: Number.NaN })).toThrow(ValidationError);
    expect(() => tree.addQuestion('B?', null, { priority: Number.POSITIVE_INFINITY })).toThrow(ValidationError);
    expect(tree.size).toBe(0);
    expect(tree.addQuestion('C?', null, { priority: 5 })).toBe(1);
  });
});

describe('QuestionTree.retractQuestion', () => {
  it('removes a childless node and frees the newest id', () => {
    const tree = sampleTree();

    tree.retractQuestion(6);

    expect(tree.size).toBe(5);
    expect(tree.getNode(2)?.children).toEqual([]);
    expect(tree.traverse().map((n) => n.id)).toEqual([1, 2, 3, 4, 5]);
    expect(tree.addQuestion('Who leads it now?', 2)).toBe(6);
  });

  it('removes a root', () => {
    const tree = new QuestionTree();
    tree.addQuestion('First?');
    tree.addQuestion('Second?');

    tree.retractQuestion(2);

    expect(tree.getRoots().map((n) => n.id)).toEqual([1]);
  });

  it('keeps later ids when an older node is retracted', () => {
    const tree = sampleTree();

    tree.retractQuestion(4);

    expect(tree.getChildren(3).map((n) => n.id)).toEqual([5]);
    expect(tree.addQuestion('Next?')).toBe(7);
  });

  it('refuses nodes with children', () => {
    const tree = sampleTree();

    expect(() => tree.retractQuestion(3)).toThrow(ValidationError);
    expect(tree.size).toBe(6);
  });
});

describe('QuestionTree.answerQuestion', () => {
  it('marks the node answered and can overwrite the answer', () => {
    const tree = sampleTree();

    expect(tree.answerQuestion(4, 'TypeScript').answered).toBe(true);
    expect(tree.answerQuestion(4, 'TypeScript 5').answer).toBe('TypeScript 5');
    expect(tree.isAnswered(4)).toBe(true);
  });

  it('fails for an unknown id', () => {
    expect(() => sampleTree().answerQuestion(99, 'x')).toThrow(NotFoundError);
  });
});

describe('QuestionTree traversal', () => {
  it('walks breadth-first from the roots in insertion order', () => {
    expect(sampleTree().traverse().map((n) => n.id)).toEqual([1, 2, 3, 6, 4, 5]);
  });

  it('lists unanswered questions breadth-first', () => {
    const tree = sampleTree();
    tree.answerQuestion(1, 'A tracker');
    tree.answerQuestion(6, 'Sam');

    expect(tree.getUnansweredQuestions().map((n) => n.id)).toEqual([2, 3, 4, 5]);
    expect(tree.getAnsweredQuestions().map((n) => n.id)).toEqual([1, 6]);
  });

  it('returns nothing once every question is answered', () => {
    const tree = sampleTree();
    for (const node of tree.traverse()) {
      tree.answerQuestion(node.id, 'done');
    }

    expect(tree.getUnansweredQuestions()).toEqual([]);
  });

  it('knows roots, children, depth and ancestors', () => {
    const tree = sampleTree();

    expect(tree.getRoots().map((n) => n.id)).toEqual([1, 2]);
    expect(tree.getChildren(3).map((n) => n.question)).toEqual(['Which language?', 'Which database?']);
    expect(tree.depthOf(1)).toBe(0);
    expect(tree.depthOf(5)).toBe(2);
    expect(tree.ancestorsOf(5)).toEqual([3, 1]);
  });

  it('keeps every node reachable from exactly one root', () => {
    const tree = sampleTree();
    const roots = new Set(tree.getRoots().map((n) => n.id));

    for (const node of tree.traverse()) {
      const path = [node.id, ...tree.ancestorsOf(node.id)];
      expect(new Set(path).size).toBe(path.length);
      expect(roots.has(path[path.length - 1] ?? -1)).toBe(true);
    }
  });

  it('hands out snapshots that do not alias the tree', () => {
    const tree = sampleTree();
    const node = tree.getNode(3);
    node?.children.push(99);

    expect(tree.getNode(3)?.children).toEqual([4, 5]);
  });
});

describe('QuestionTree priorities', () => {
  it('updates priority and rejects non-finite values', () => {
    const tree = sampleTree();

    expect(tree.setPriority(5, 3).priority).toBe(3);
    expect(() => tree.setPriority(5, Number.NaN)).toThrow(ValidationError);
    expect(() => tree.setPriority(99, 1)).toThrow(NotFoundError);
  });
});

describe('QuestionTree serialization', () => {
  it('serializes every node keyed by id', () => {
    const tree = new QuestionTree();
    tree.addQuestion('Root?');
    tree.addQuestion('Child?', 1, { priority: 1 });
    tree.answerQuestion(2, 'Yes');

    expect(tree.toJSON()).toEqual({
      nodes: {
        '1': { id: 1, question: 'Root?', answer: null, metadata: {}, parentId: null, priority: 0 },
        '2': { id: 2, question: 'Child?', answer: 'Yes', metadata: {}, parentId: 1, priority: 1 },
      },
    });
  });

  it('rebuilds the same forest from its nodes', () => {
    const tree = sampleTree();
    tree.answerQuestion(4, 'TypeScript');

    const copy = QuestionTree.fromNodes([...tree.toNodes()].reverse());

    expect(copy.traverse()).toEqual(tree.traverse());
    expect(copy.addQuestion('Next?')).toBe(7);
  });

  it('refuses stored nodes with a non-finite priority', () => {
    expect(() =>
      QuestionTree.fromNodes([
        { id: 1, question: 'Root?', answer: null, metadata: {}, parentId: null, priority: Number.NaN },
      ])
    ).toThrow(ValidationError);
  });

  it('refuses nodes whose parent is missing', () => {
    expect(() =>
      QuestionTree.fromNodes([{ id: 2, question: 'Child?', answer: null, metadata: {}, parentId: 1, priority: 0 }])
    ).toThrow(InvalidParentError);
  });
});
