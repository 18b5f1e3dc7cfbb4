import { fatModel } from '../src/analyzers/best-practices/fat-model';
import { hardcodedStoragePaths } from '../src/analyzers/best-practices/hardcoded-storage-paths';
import { logicInRoutes } from '../src/analyzers/best-practices/logic-in-routes';
import { mvcStructureViolation } from '../src/analyzers/best-practices/mvc-structure-violation';
import { queryBuilderInController } from '../src/analyzers/best-practices/query-builder-in-controller';
import { serviceContainerResolution } from '../src/analyzers/best-practices/service-container-resolution';
import { analyzeSource, modelSource } from './helpers';

const CONTROLLER_FILE = 'app/Http/Controllers/OrderController.php';

function controller(body: string): string {
  return `<?php
namespace App\\Http\\Controllers;

use App\\Models\\Post;
use Illuminate\\Support\\Facades\\DB;

class OrderController extends Controller
{
    public function store($name)
    {
${body}
    }
}
`;
}

describe('query-builder-in-controller', () => {
  it('should report each query method once per controller method', () => {
    const issues = analyzeSource(
      queryBuilderInController,
      controller(`        $posts = Post::where('published', true)->orderBy('created_at')->get();
        $stats = DB::table('posts')->join('users', 'users.id', '=', 'posts.user_id')->count();
        $drafts = Post::where('draft', true)->get();`),
      { file: CONTROLLER_FILE },
    );

    expect(issues.map((issue) => [issue.metadata.query, issue.severity, issue.location.line])).toEqual([
      ['orderBy()', 'low', 11],
      ['where()', 'medium', 11],
      ['join()', 'high', 12],
      ['DB::table()', 'low', 12],
    ]);
    expect(issues[0].message).toBe("Direct database query 'orderBy()' used in controller method 'store'");
    expect(issues[0].metadata).toEqual({ query: 'orderBy()', method: 'store', class: 'OrderController', type: 'query_builder' });
  });

  it('should accept the allowed lookup methods', () => {
    const issues = analyzeSource(queryBuilderInController, controller('        return Post::findOrFail(1);'), {
      file: CONTROLLER_FILE,
    });
    expect(issues).toEqual([]);
  });

  it('should ignore classes that are not controllers', () => {
    const source = `<?php
class OrderRepository
{
    public function recent()
    {
        return Post::where('published', true)->orderBy('created_at')->get();
    }
}
`;
    expect(analyzeSource(queryBuilderInController, source, { file: 'app/Repositories/OrderRepository.php' })).toEqual([]);
  });
});

describe('fat-model', () => {
  const body = `    public function customer()
    {
        return $this->belongsTo(Customer::class);
    }
    public function scopePaid($query)
    {
        return $query->where('paid', true);
    }
    public function getTotalAttribute()
    {
        return 0;
    }
    protected function recalculate()
    {
    }
    public function ship()
    {
    }
    public function cancel()
    {
    }
    public function refund()
    {
        if ($this->paid && $this->shipped || $this->refunded) {
            return false;
        }
        return true;
    }`;

  it('should count business methods and measure their complexity', () => {
    const issues = analyzeSource(fatModel, modelSource('Order', body), {
      file: 'app/Models/Order.php',
      options: { method_threshold: 2, complexity_threshold: 2 },
    });

    expect(issues.map((issue) => [issue.code, issue.severity, issue.location.line, issue.message])).toEqual([
      [
        'fat-model-methods',
        'low',
        6,
        'Model "Order" has 3 business methods (threshold: 2). Consider extracting logic to service classes',
      ],
      ['fat-model-complexity', 'low', 29, 'Method "Order::refund()" has complexity of 4 (threshold: 2)'],
    ]);
  });

  it('should accept models within the default thresholds', () => {
    expect(analyzeSource(fatModel, modelSource('Order', body), { file: 'app/Models/Order.php' })).toEqual([]);
  });

  it('should ignore classes that are not models', () => {
    const source = `<?php
class OrderPresenter
{
${body}
}
`;
    const issues = analyzeSource(fatModel, source, {
      file: 'app/Presenters/OrderPresenter.php',
      options: { method_threshold: 1, complexity_threshold: 1 },
    });
    expect(issues).toEqual([]);
  });
});

describe('mvc-structure-violation', () => {
  it('should flag models that render views', () => {
    const source = modelSource(
      'Invoice',
      `    public function render()
    {
        return view('invoices.show', ['invoice' => $this]);
    }`,
    );
    const issues = analyzeSource(mvcStructureViolation, source, { file: 'app/Models/Invoice.php' });

    expect(issues.map((issue) => [issue.code, issue.location.line, issue.message])).toEqual([
      ['model-rendering-method', 8, 'Model "Invoice" has rendering method "render()" (MVC violation)'],
      ['model-calls-view', 8, 'Model "Invoice" method "render()" calls view() helper (MVC violation)'],
    ]);
  });

  it('should flag controller methods over the line limit', () => {
    const source = `<?php
namespace App\\Http\\Controllers;

class ReportController extends Controller
{
    public function index()
    {
        $a = 1;
        $b = 2;
        $c = 3;
        return $a + $b + $c;
    }
}
`;
    const file = 'app/Http/Controllers/ReportController.php';
    const issues = analyzeSource(mvcStructureViolation, source, { file, options: { max_controller_method_lines: 3 } });

    expect(issues).toHaveLength(1);
    expect(issues[0].code).toBe('controller-method-too-long');
    expect(issues[0].message).toBe(
      'Controller method "ReportController::index()" has 6 lines (max: 3). Large methods indicate business logic in controller',
    );
    expect(analyzeSource(mvcStructureViolation, source, { file })).toEqual([]);
  });
});

describe('logic-in-routes', () => {
  it('should grade route closures by what they contain', () => {
    const source = `<?php

use App\\Models\\Post;
use Illuminate\\Support\\Facades\\Route;

Route::get('/posts', function () {
    return Post::where('published', true)->get();
});
Route::get('/about', fn () => view('about'));
Route::middleware('auth')->group(function () {
    Route::post('/orders', function () {
        Mail::to('ops@example.com')->send(new OrderPlaced());
    });
});
`;
    const issues = analyzeSource(logicInRoutes, source, { file: 'routes/web.php' });

    expect(issues.map((issue) => [issue.code, issue.severity, issue.location.line, issue.message])).toEqual([
      ['route-has-db-queries', 'critical', 6, 'Route closure contains database queries'],
      ['route-has-business-logic', 'high', 11, 'Route closure contains complex business logic'],
    ]);
  });

  it('should flag closures over the line limit', () => {
    const source = `<?php

use Illuminate\\Support\\Facades\\Route;

Route::get('/health', function () {
    return 'ok';
});
`;
    const issues = analyzeSource(logicInRoutes, source, { file: 'routes/api.php', options: { max_closure_lines: 2 } });
    expect(issues.map((issue) => [issue.code, issue.severity, issue.message])).toEqual([
      ['route-closure-too-long', 'medium', 'Route closure contains 3 lines (max: 2)'],
    ]);
  });

  it('should only look at route files', () => {
    const source = `<?php
Route::get('/posts', function () {
    return Post::all();
});
`;
    expect(analyzeSource(logicInRoutes, source, { file: 'app/Support/routes.php' })).toEqual([]);
  });
});

describe('service-container-resolution', () => {
  it('should flag manual resolution with severity by argument kind', () => {
    const issues = analyzeSource(
      serviceContainerResolution,
      controller(`        $gateway = app(PaymentGateway::class);
        $ledger = app('payments.ledger');
        $handler = resolve($name);
        $config = app('config');
        app()->bind(Gateway::class, FakeGateway::class);`),
      { file: CONTROLLER_FILE },
    );

    expect(issues.map((issue) => [issue.location.line, issue.severity, issue.metadata.pattern])).toEqual([
      [11, 'medium', 'app()'],
      [12, 'high', 'app()'],
      [13, 'medium', 'resolve()'],
      [15, 'high', 'app()->bind()'],
    ]);
    expect(issues[0].message).toBe("Manual service resolution in 'OrderController::store': app()");
    expect(issues[0].metadata.argument_type).toBe('class');
  });

  it('should skip whitelisted classes and service providers', () => {
    const job = `<?php
class SendInvoiceJob
{
    public function handle()
    {
        return app(InvoiceMailer::class);
    }
}
`;
    expect(analyzeSource(serviceContainerResolution, job, { file: 'app/Jobs/SendInvoiceJob.php' })).toEqual([]);

    const provider = `<?php
class BillingServiceProvider
{
    public function register()
    {
        app()->bind(Gateway::class, FakeGateway::class);
    }
}
`;
    expect(analyzeSource(serviceContainerResolution, provider, { file: 'app/Providers/BillingServiceProvider.php' })).toEqual([]);
  });

  it('should ignore resolution inside closures', () => {
    const issues = analyzeSource(
      serviceContainerResolution,
      controller(`        return collect([1])->map(function ($id) {
            return app(PaymentGateway::class);
        });`),
      { file: CONTROLLER_FILE },
    );
    expect(issues).toEqual([]);
  });
});

describe('hardcoded-storage-paths', () => {
  const body = `        $log = file_get_contents('/var/www/html/storage/logs/laravel.log');
        $export = file_get_contents('/storage/app/exports/report.csv');
        $label = '/storage/app/exports';
        $exportPath = '/storage/app/exports';
        $avatar = asset('/public/uploads/avatar.png');
        $logoPath = '/public/images/logo.png';`;

  it('should flag paths that reach the filesystem', () => {
    const issues = analyzeSource(hardcodedStoragePaths, controller(body), { file: CONTROLLER_FILE });

    expect(issues.map((issue) => [issue.location.line, issue.metadata.helper])).toEqual([
      [11, 'storage_path(...)'],
      [12, "storage_path('app/...')"],
      [14, "storage_path('app/...')"],
    ]);
    expect(issues[0].message).toBe('Hardcoded storage path found: "/var/www/html/storage/logs/laravel.log"');
  });

  it('should skip allowed paths', () => {
    const issues = analyzeSource(hardcodedStoragePaths, controller(body), {
      file: CONTROLLER_FILE,
      options: { allowed_paths: ['/storage/app/exports'] },
    });
    expect(issues.map((issue) => issue.location.line)).toEqual([11]);
  });
});
