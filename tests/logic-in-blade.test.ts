import {
  hasApiCall,
  hasComplexCalculation,
  hasDatabaseQuery,
  isInsideStringOrComment,
  logicInBlade,
} from '../src/analyzers/best-practices/logic-in-blade';
import { runAnalysis } from '../src/core/runner';
import { createProject, removeProject } from './helpers';

const VIEW = [
  '<h1>{{ $title }}</h1>',
  '@php',
  ...Array.from({ length: 11 }, (_, i) => `    $step${i} = ${i};`),
  '@endphp',
  '@foreach ($posts as $post)',
  '    @foreach ($post->tags as $tag)',
  "        {{ str_replace('-', ' ', $tag->slug) }}",
  '    @endforeach',
  '    {{ $post->comments()->count() }}',
  '@endforeach',
  '@if ($user && $user->active && $post->published && !$post->archived)',
  '@endif',
  "{{ Http::get('https://api.test/rates')->json()['usd'] }}",
  '<?php echo $legacy; ?>',
  '{{ $subtotal * 1.2 + $shipping }}',
  '@php',
  '    $late = true;',
].join('\n');

describe('logic-in-blade', () => {
  describe('line checks', () => {
    it('should recognize queries by namespace, terminal method or relation call', () => {
      expect(hasDatabaseQuery("{{ \\App\\Models\\Post::where('published', true)->count() }}")).toBe(true);
      expect(hasDatabaseQuery('{{ $user->posts()->count() }}')).toBe(true);
      expect(hasDatabaseQuery('@php $order->save(); @endphp')).toBe(true);
      expect(hasDatabaseQuery("{{ DB::table('posts')->count() }}")).toBe(true);
    });

    it('should leave look-alike calls alone', () => {
      expect(hasDatabaseQuery("{{ Post::where('status', 'draft') }}")).toBe(false);
      expect(hasDatabaseQuery('{{ Arr::first($items) }}')).toBe(false);
      expect(hasDatabaseQuery("{{ config()->get('app.name') }}")).toBe(false);
      expect(hasDatabaseQuery('@php $file->save(); @endphp')).toBe(false);
      expect(hasDatabaseQuery('{{ $rows->filter()->count() }}')).toBe(false);
      expect(hasDatabaseQuery("{{ 'Use DB::table to query' }}")).toBe(false);
    });

    it('should ignore matches inside strings and comments', () => {
      expect(isInsideStringOrComment("{{ 'Http::get' }}", 4)).toBe(true);
      expect(isInsideStringOrComment('// Http::get', 3)).toBe(true);
      expect(isInsideStringOrComment('{{ Http::get() }}', 3)).toBe(false);
      expect(hasApiCall("{{ 'Http::get' }}")).toBe(false);
      expect(hasApiCall('@php curl_exec($handle); @endphp')).toBe(true);
    });

    it('should only treat multi-step arithmetic as a calculation', () => {
      expect(hasComplexCalculation('{{ $total }}')).toBe(false);
      expect(hasComplexCalculation('{{ $price * $quantity }}')).toBe(false);
      expect(hasComplexCalculation('{{ $discount ?? 0 }}')).toBe(false);
      expect(hasComplexCalculation('{{ $subtotal * 1.2 + $shipping }}')).toBe(true);
    });
  });

  describe('project scan', () => {
    let root: string;

    afterEach(() => {
      removeProject(root);
    });

    it('should report one finding per line in priority order', async () => {
      root = createProject({ 'resources/views/posts/index.blade.php': VIEW });
      const result = await runAnalysis({ projectPath: root, analyzers: [logicInBlade.create({})] });

      expect(result.issues.map((issue) => [issue.location.line, issue.code, issue.severity])).toEqual([
        [2, 'blade-php-block-too-long', 'medium'],
        [16, 'blade-nested-foreach', 'medium'],
        [17, 'blade-expensive-computation', 'medium'],
        [19, 'blade-has-db-query', 'critical'],
        [21, 'blade-has-business-logic', 'medium'],
        [23, 'blade-has-api-call', 'high'],
        [24, 'blade-inline-php', 'medium'],
        [25, 'blade-has-calculation', 'low'],
        [26, 'blade-unclosed-php-block', 'high'],
      ]);
      expect(result.issues[0].message).toBe('PHP block has 11 lines (max recommended: 10)');
      expect(result.issues[0].metadata).toEqual({ block_lines: 11, max_lines: 10, block_start: 2 });
      expect(result.issues[1].message).toBe('Nested @foreach detected (depth: 2) - potential performance issue');
      expect(result.issues[3].location.file).toBe('resources/views/posts/index.blade.php');
      expect(result.issues[3].snippet).toBe('{{ $post->comments()->count() }}');
      expect(result.issues[8].metadata).toEqual({ block_start: 26, lines_counted: 1 });
    });

    it('should accept longer blocks up to max_php_block_lines', async () => {
      root = createProject({ 'resources/views/posts/index.blade.php': VIEW });
      const result = await runAnalysis({
        projectPath: root,
        analyzers: [logicInBlade.create({ max_php_block_lines: 11 })],
      });
      expect(result.issues.map((issue) => issue.code)).not.toContain('blade-php-block-too-long');
      expect(result.issues).toHaveLength(8);
    });

    it('should not open a block for single-line @php directives', async () => {
      root = createProject({
        'resources/views/partials/count.blade.php': '@php($count = $posts->count())\n<p>{{ $count }}</p>\n@php $shown = true; @endphp\n',
      });
      const result = await runAnalysis({ projectPath: root, analyzers: [logicInBlade.create({})] });
      expect(result.issues).toEqual([]);
    });

    it('should only scan Blade views', async () => {
      root = createProject({
        'resources/views/emails/plain.php': '<?php echo Post::all(); ?>\n',
        'resources/js/app.blade.txt': '{{ Post::all() }}\n',
      });
      const result = await runAnalysis({ projectPath: root, analyzers: [logicInBlade.create({})] });
      expect(result.issues).toEqual([]);
    });
  });
});
