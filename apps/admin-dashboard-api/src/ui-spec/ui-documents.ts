import { emailPathSegment } from '../common/http/path-segment';
import type { DocumentPaths } from '../config/app-config';
import type { ButtonNode, DataTableNode, ModalNode, UiDocument } from './ui-node.types';

// Row templates; the SDK substitutes the row's value for `{email}`.
const ROW_EMAIL = '{email}';

function addUserModal(paths: DocumentPaths): ModalNode {
  return {
    type: 'Modal',
    title: 'Add New User',
    size: 'md',
    children: [
      {
        type: 'Form',
        endpoint: `${paths.apiBasePath}/users`,
        method: 'POST',
        submitText: 'Create User',
        cancelText: 'Cancel',
        fields: [
          {
            type: 'TextField',
            name: 'email',
            label: 'Email',
            inputType: 'email',
            required: true,
            placeholder: 'user@example.com'
          },
          { type: 'TextField', name: 'password', label: 'Password', inputType: 'password', required: true },
          { type: 'Checkbox', name: 'email_verified', label: 'Email Verified', checkboxLabel: 'Mark email as verified' }
        ],
        onSuccess: { type: 'refresh' }
      }
    ]
  };
}

function addUserButton(paths: DocumentPaths): ButtonNode {
  return {
    type: 'Button',
    label: 'Add User',
    variant: 'primary',
    icon: '+',
    onClick: { type: 'openModal', modal: addUserModal(paths) }
  };
}

function recentUsersTable(paths: DocumentPaths): DataTableNode {
  return {
    type: 'DataTable',
    endpoint: `${paths.apiBasePath}/users`,
    pagination: false,
    pageSize: 5,
    searchable: false,
    columns: [
      { key: 'email', label: 'Email' },
      { key: 'email_verified', label: 'Verified', type: 'boolean' },
      { key: 'created_at', label: 'Created', type: 'datetime' }
    ],
    rowActions: [
      {
        type: 'Button',
        label: 'View',
        variant: 'ghost',
        size: 'sm',
        onClick: { type: 'navigate', to: `${paths.uiBasePath}/users/${ROW_EMAIL}` }
      }
    ],
    emptyMessage: 'No users yet'
  };
}

export function dashboardDocument(paths: DocumentPaths): UiDocument {
  return {
    type: 'Page',
    title: 'Admin Dashboard',
    description: 'Overview of your application',
    actions: [addUserButton(paths)],
    children: [
      {
        type: 'StatsGrid',
        columns: 4,
        endpoint: `${paths.apiBasePath}/stats`,
        items: [
          {
            label: 'Total Users',
            valueKey: 'total_users',
            icon: 'users',
            onClick: { type: 'navigate', to: `${paths.uiBasePath}/users` }
          },
          { label: 'Verified', valueKey: 'verified_users', icon: 'check' },
          { label: 'Unverified', valueKey: 'unverified_users', icon: 'clock' },
          { label: '2FA Enabled', valueKey: 'two_factor_enabled', icon: 'shield' }
        ]
      },
      {
        type: 'Card',
        title: 'Recent Users',
        subtitle: 'Latest registered users',
        className: 'mt-6',
        children: [recentUsersTable(paths)],
        footer: [{ type: 'Link', label: 'View all users →', href: `${paths.uiBasePath}/users` }]
      }
    ]
  };
}

export function usersListDocument(paths: DocumentPaths): UiDocument {
  return {
    type: 'Page',
    title: 'Users',
    description: 'Manage user accounts',
    actions: [addUserButton(paths)],
    children: [
      {
        type: 'Card',
        children: [
          {
            type: 'DataTable',
            endpoint: `${paths.apiBasePath}/users`,
            pagination: true,
            pageSize: 20,
            searchable: true,
            sortable: true,
            columns: [
              { key: 'email', label: 'Email', sortable: true },
              { key: 'email_verified', label: 'Verified', type: 'boolean', sortable: true },
              { key: 'two_factor_enabled', label: '2FA', type: 'boolean' },
              { key: 'created_at', label: 'Created', type: 'datetime', sortable: true },
              { key: 'updated_at', label: 'Updated', type: 'datetime' }
            ],
            rowActions: [
              {
                type: 'Button',
                label: 'Edit',
                variant: 'ghost',
                size: 'sm',
                onClick: { type: 'navigate', to: `${paths.uiBasePath}/users/${ROW_EMAIL}` }
              },
              {
                type: 'Button',
                label: 'Delete',
                variant: 'danger',
                size: 'sm',
                onClick: {
                  type: 'api',
                  method: 'DELETE',
                  endpoint: `${paths.apiBasePath}/users/${ROW_EMAIL}`,
                  confirm: 'Are you sure you want to delete this user?',
                  onSuccess: { type: 'refresh' }
                }
              }
            ],
            emptyMessage: 'No users found'
          }
        ]
      }
    ]
  };
}

/** Caller must have validated `email`. */
export function userEditDocument(paths: DocumentPaths, email: string): UiDocument {
  const userEndpoint = `${paths.apiBasePath}/users/${emailPathSegment(email)}`;
  const backToUsers = { type: 'navigate', to: `${paths.uiBasePath}/users` } as const;

  return {
    type: 'Page',
    title: 'Edit User',
    description: email,
    actions: [{ type: 'Button', label: 'Back to Users', variant: 'outline', onClick: backToUsers }],
    children: [
      {
        type: 'Card',
        title: 'User Details',
        children: [
          {
            type: 'Form',
            endpoint: userEndpoint,
            method: 'PUT',
            dataEndpoint: userEndpoint,
            submitText: 'Save Changes',
            fields: [
              { type: 'TextField', name: 'email', label: 'Email', inputType: 'email', readOnly: true, placeholder: email },
              { type: 'Checkbox', name: 'email_verified', label: 'Email Status', checkboxLabel: 'Email verified' },
              { type: 'Checkbox', name: 'two_factor_enabled', label: 'Two-Factor Auth', checkboxLabel: '2FA enabled' }
            ],
            onSuccess: backToUsers
          }
        ]
      },
      {
        type: 'Card',
        title: 'Metadata',
        className: 'mt-6',
        dataEndpoint: userEndpoint,
        children: [
          {
            type: 'Row',
            gap: 24,
            children: [
              {
                type: 'Column',
                children: [
                  { type: 'Text', content: 'Created', variant: 'small' },
                  { type: 'Text', field: 'created_at', variant: 'body' }
                ]
              },
              {
                type: 'Column',
                children: [
                  { type: 'Text', content: 'Last Updated', variant: 'small' },
                  { type: 'Text', field: 'updated_at', variant: 'body' }
                ]
              }
            ]
          }
        ]
      },
      {
        type: 'Card',
        title: 'Danger Zone',
        className: 'mt-6',
        children: [
          { type: 'Alert', variant: 'warning', message: 'Deleting a user is permanent and cannot be undone.' },
          {
            type: 'Button',
            label: 'Delete User',
            variant: 'danger',
            className: 'mt-4',
            onClick: {
              type: 'api',
              method: 'DELETE',
              endpoint: userEndpoint,
              confirm: `Are you sure you want to delete ${email}?`,
              onSuccess: backToUsers
            }
          }
        ]
      }
    ]
  };
}
