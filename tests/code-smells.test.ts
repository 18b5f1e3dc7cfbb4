import { configOutsideConfig } from '../src/analyzers/best-practices/config-outside-config';
import { environmentCheckSmell } from '../src/analyzers/best-practices/environment-check-smell';
import { facadeUsage } from '../src/analyzers/best-practices/facade-usage';
import { frameworkOverride } from '../src/analyzers/best-practices/framework-override';
import { genericExceptionCatch } from '../src/analyzers/best-practices/generic-exception-catch';
import { helperFunctionAbuse } from '../src/analyzers/best-practices/helper-function-abuse';
import { analyzeSource } from './helpers';

function service(body: string): string {
  return `<?php
namespace App\\Services;

use Illuminate\\Support\\Facades\\App;

class ReportService
{
    public function run()
    {
${body}
    }
}
`;
}

describe('environment-check-smell', () => {
  it('should flag environment checks driving behavior', () => {
    const issues = analyzeSource(
      environmentCheckSmell,
      service(`        if (app()->environment('local')) {
            return 'debug';
        }
        if (app()->isLocal()) {
            return 'verbose';
        }
        return App::environment() === 'staging' ? 'beta' : 'stable';`),
    );

    expect(issues.map((issue) => [issue.location.line, issue.message])).toEqual([
      [10, 'Using app()->environment() for feature flags or behavior changes'],
      [13, 'Using app()->isLocal() for feature flags or behavior changes'],
      [16, 'Using App::environment() for feature flags or behavior changes'],
    ]);
    expect(issues[2].metadata).toEqual({ call: 'App::environment()' });
  });

  it('should leave service providers alone', () => {
    const source = service(`        return app()->isProduction();`);
    expect(analyzeSource(environmentCheckSmell, source, { file: 'app/Providers/AppServiceProvider.php' })).toEqual([]);
  });
});

describe('generic-exception-catch', () => {
  it('should flag catches of Exception and Throwable', () => {
    const issues = analyzeSource(
      genericExceptionCatch,
      service(`        try {
            $this->export();
        } catch (ModelNotFoundException | Exception $e) {
            report($e);
        } catch (Throwable $e) {
            report($e);
        }`),
    );
    expect(issues.map((issue) => issue.message)).toEqual([
      'Catching generic Exception instead of specific exception type',
      'Catching generic Throwable instead of specific exception type',
    ]);
    expect(issues[0].metadata).toEqual({ type: 'Exception' });
  });

  it('should accept specific exception types', () => {
    const issues = analyzeSource(
      genericExceptionCatch,
      service(`        try {
            $this->export();
        } catch (QueryException $e) {
            report($e);
        }`),
    );
    expect(issues).toEqual([]);
  });
});

describe('framework-override', () => {
  it('should flag subclasses of core framework classes', () => {
    const source = `<?php
namespace App\\Http;

use Illuminate\\Http\\Request;

class ApiRequest extends Request
{
}
`;
    const issues = analyzeSource(frameworkOverride, source, { file: 'app/Http/ApiRequest.php' });

    expect(issues).toHaveLength(1);
    expect(issues[0].severity).toBe('high');
    expect(issues[0].location.line).toBe(6);
    expect(issues[0].message).toBe('Class "ApiRequest" extends core framework class "Illuminate\\Http\\Request"');
    expect(issues[0].metadata).toEqual({ class: 'App\\Http\\ApiRequest', parent: 'Illuminate\\Http\\Request' });
  });

  it('should accept framework extension points', () => {
    const source = `<?php
namespace App\\Http\\Requests;

use Illuminate\\Foundation\\Http\\FormRequest;

class StorePostRequest extends FormRequest
{
}
`;
    expect(analyzeSource(frameworkOverride, source, { file: 'app/Http/Requests/StorePostRequest.php' })).toEqual([]);
  });
});

describe('config-outside-config', () => {
  it('should flag hardcoded URLs and secret-like strings', () => {
    const issues = analyzeSource(
      configOutsideConfig,
      service(`        $client = new Client(['base_uri' => 'https://api.payments.test/v1']);
        $key = 'abcdefghijklmnopqrstuvwxyz0123456789';
        $docs = 'https://laravel.com/docs';`),
    );

    expect(issues.map((issue) => [issue.location.line, issue.severity, issue.message])).toEqual([
      [10, 'medium', 'Hardcoded URL: "https://api.payments.test/v1"'],
      [11, 'high', 'Possible hardcoded API key or secret detected'],
    ]);
    expect(issues[1].metadata).toEqual({ length: 36, kind: 'secret' });
  });

  it('should apply additional patterns from options', () => {
    const issues = analyzeSource(configOutsideConfig, service(`        $key = 'sk_test_placeholder';`), {
      options: { additional_patterns: { '^sk_test_': 'Payment test key' } },
    });
    expect(issues.map((issue) => issue.message)).toEqual(['Payment test key: "sk_test_placeholder"']);
  });

  it('should not look inside config files', () => {
    const source = `<?php
return ['url' => 'https://api.payments.test/v1'];
`;
    expect(analyzeSource(configOutsideConfig, source, { file: 'config/services.php' })).toEqual([]);
  });
});

describe('facade-usage', () => {
  const body = `        Cache::get('report');
        Cache::put('report', []);
        Log::info('report built');
        DB::table('reports')->count();
        Mail::to('ops@example.com')->send(new ReportMail());
        Event::dispatch('report.built');
        Storage::put('report.csv', '');`;

  it('should flag classes that use more facades than the threshold', () => {
    const issues = analyzeSource(facadeUsage, service(body));

    expect(issues).toHaveLength(1);
    expect(issues[0].severity).toBe('low');
    expect(issues[0].location.line).toBe(6);
    expect(issues[0].message).toBe("Class 'ReportService' uses 6 different facades (threshold: 5)");
    expect(issues[0].metadata).toEqual({
      class: 'ReportService',
      facades: ['Cache', 'DB', 'Event', 'Log', 'Mail', 'Storage'],
      count: 6,
      threshold: 5,
    });
  });

  it('should honor a custom threshold', () => {
    expect(analyzeSource(facadeUsage, service(body), { options: { threshold: 6 } })).toEqual([]);
  });
});

describe('helper-function-abuse', () => {
  const body = `        $timezone = config('app.timezone');
        $locale = config('app.locale');
        $name = config('app.name');
        $since = now()->subDay();
        $user = auth()->id();
        return request('page');`;

  it('should flag classes leaning on helper functions', () => {
    const issues = analyzeSource(helperFunctionAbuse, service(body));

    expect(issues).toHaveLength(1);
    expect(issues[0].severity).toBe('low');
    expect(issues[0].message).toBe("Class 'ReportService' uses 6 helper function calls (threshold: 5)");
    expect(issues[0].metadata.helpers).toEqual({ auth: 1, config: 3, now: 1, request: 1 });
  });

  it('should honor a custom threshold', () => {
    expect(analyzeSource(helperFunctionAbuse, service(body), { options: { threshold: 10 } })).toEqual([]);
  });
});
