import { massAssignment } from '../src/analyzers/security/mass-assignment';
import { ModelRegistry } from '../src/core/model-registry';
import { analyzeSource, modelSource } from './helpers';

function controller(body: string): string {
  return `<?php
namespace App\\Http\\Controllers;

use App\\Models\\Post;
use Illuminate\\Http\\Request;

class PostController extends Controller
{
    public function store(Request $request, Post $post)
    {
${body}
    }
}
`;
}

function modelFixture(name: string, body = '') {
  const source = modelSource(name, body);
  return { source, registry: ModelRegistry.fromSources([{ file: `app/Models/${name}.php`, source }]) };
}

describe('mass-assignment', () => {
  describe('request input', () => {
    it('should flag a model write fed with every request field', () => {
      const issues = analyzeSource(massAssignment, controller('        return Post::create($request->all());'));

      expect(issues).toHaveLength(1);
      expect(issues[0].severity).toBe('high');
      expect(issues[0].location.line).toBe(11);
      expect(issues[0].message).toBe(
        'Mass assignment with unfiltered request input: Post::create() receives $request->all()',
      );
      expect(issues[0].metadata).toEqual({ call: 'Post::create()', source: '$request->all()' });
    });

    it('should flag instance writes fed by the request() helper', () => {
      const issues = analyzeSource(massAssignment, controller('        $post->update(request()->all());'));
      expect(issues.map((issue) => issue.message)).toEqual([
        'Mass assignment with unfiltered request input: ->update() receives request()->all()',
      ]);
    });

    it('should accept validated and filtered input', () => {
      const issues = analyzeSource(
        massAssignment,
        controller(`        $post->fill($request->validated());
        $post->update($request->only(['title', 'body']));
        return Post::create(['title' => $request->input('title')]);`),
      );
      expect(issues).toEqual([]);
    });

    it('should follow configured request variable names', () => {
      const source = controller('        return Post::create($input->all());');
      expect(analyzeSource(massAssignment, source)).toEqual([]);
      expect(
        analyzeSource(massAssignment, source, { options: { request_variables: ['input'] } }).map((issue) => issue.metadata.source),
      ).toEqual(['$input->all()']);
    });
  });

  describe('model protection', () => {
    it('should flag an empty $guarded as critical', () => {
      const { source, registry } = modelFixture('Post', '    protected $guarded = [];');
      const issues = analyzeSource(massAssignment, source, { file: 'app/Models/Post.php', registry });

      expect(issues).toHaveLength(1);
      expect(issues[0].code).toBe('model-empty-guarded');
      expect(issues[0].severity).toBe('critical');
      expect(issues[0].location.line).toBe(6);
      expect(issues[0].message).toBe("Model 'Post' sets $guarded = [], which allows every attribute to be mass assigned");
    });

    it('should flag a model without $fillable or $guarded', () => {
      const { source, registry } = modelFixture('Comment');
      const issues = analyzeSource(massAssignment, source, { file: 'app/Models/Comment.php', registry });
      expect(issues.map((issue) => [issue.code, issue.message])).toEqual([
        ['model-missing-protection', "Model 'Comment' declares neither $fillable nor $guarded"],
      ]);
    });

    it('should accept models that declare $fillable', () => {
      const { source, registry } = modelFixture('Tag', "    protected $fillable = ['name'];");
      expect(analyzeSource(massAssignment, source, { file: 'app/Models/Tag.php', registry })).toEqual([]);
    });

    it('should skip model checks when disabled', () => {
      const { source, registry } = modelFixture('Comment');
      const issues = analyzeSource(massAssignment, source, {
        file: 'app/Models/Comment.php',
        registry,
        options: { check_model_protection: false },
      });
      expect(issues).toEqual([]);
    });
  });
});
