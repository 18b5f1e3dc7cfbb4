import { silentFailure } from '../src/analyzers/best-practices/silent-failure';
import { analyzeSource } from './helpers';

function service(body: string): string {
  return `<?php
namespace App\\Services;

use Illuminate\\Support\\Facades\\Log;

class SyncService
{
    public function run($path, $raw, $handler)
    {
${body}
    }
}
`;
}

describe('silent-failure', () => {
  describe('catch blocks', () => {
    it('should flag an empty catch block', () => {
      const issues = analyzeSource(
        silentFailure,
        service(`        try {
            $this->client->send();
        } catch (TransportException $e) {
        }`),
      );

      expect(issues).toHaveLength(1);
      expect(issues[0].severity).toBe('high');
      expect(issues[0].message).toBe('Empty catch block silently swallows exceptions');
      expect(issues[0].metadata).toEqual({ types: ['TransportException'] });
    });

    it('should accept an empty catch block that explains itself', () => {
      const issues = analyzeSource(
        silentFailure,
        service(`        try {
            $this->client->send();
        } catch (TransportException $e) {
            // best effort, the next sync retries
        }`),
      );
      expect(issues).toEqual([]);
    });

    it('should flag broad catches that neither log nor rethrow', () => {
      const issues = analyzeSource(
        silentFailure,
        service(`        try {
            $this->client->send();
        } catch (Exception $e) {
            $this->failures++;
        }`),
      );
      expect(issues.map((issue) => [issue.severity, issue.message])).toEqual([
        ['high', 'Catching Exception is overly broad and can mask fatal errors'],
        ['medium', 'Catch block does not log exception or rethrow'],
      ]);
    });

    it('should accept catches that log, return or use the exception', () => {
      const issues = analyzeSource(
        silentFailure,
        service(`        try {
            $this->client->send();
        } catch (TransportException $e) {
            Log::warning('Sync failed');
        }
        try {
            $this->client->send();
        } catch (TimeoutException $e) {
            return null;
        }
        try {
            $this->client->send();
        } catch (ConnectionException $e) {
            $this->lastError = $e;
        }`),
      );
      expect(issues).toEqual([]);
    });

    it('should skip whitelisted exception types', () => {
      const issues = analyzeSource(
        silentFailure,
        service(`        try {
            $this->repository->findOrFail(1);
        } catch (ModelNotFoundException $e) {
        }`),
      );
      expect(issues).toEqual([]);
    });
  });

  describe('error suppression', () => {
    it('should grade @ by what it silences', () => {
      const issues = analyzeSource(
        silentFailure,
        service(`        $contents = @file_get_contents($path);
        $decoded = @json_decode($raw);
        $result = @$handler();`),
      );
      expect(issues.map((issue) => [issue.location.line, issue.severity, issue.message])).toEqual([
        [11, 'medium', 'Error suppression operator (@) hides errors'],
        [12, 'high', 'Dynamic error suppression is particularly dangerous'],
      ]);
    });

    it('should flag @ inside a catch block as double silencing', () => {
      const issues = analyzeSource(
        silentFailure,
        service(`        try {
            $this->client->send();
        } catch (TransportException $e) {
            @json_decode($raw);
            throw $e;
        }`),
      );
      expect(issues.map((issue) => issue.message)).toEqual([
        'Error suppression operator (@) inside catch block creates double silencing',
      ]);
    });
  });

  it('should not analyze test directories', () => {
    const source = service(`        try {
            $this->client->send();
        } catch (TransportException $e) {
        }`);
    expect(analyzeSource(silentFailure, source, { file: 'tests/Feature/SyncTest.php' })).toEqual([]);
  });
});
